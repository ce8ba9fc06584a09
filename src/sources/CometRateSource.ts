// CometRateSource: reads utilization and supply rate from a Compound III style pool
import { Contract, JsonRpcProvider, type ContractRunner } from 'ethers';

import type { RateSource, RateSourceFactory } from './RateSource.js';

export const COMET_ABI = [
  'function getUtilization() external view returns (uint256)',
  'function getSupplyRate(uint256 utilization) external view returns (uint64)'
];

function asBigInt(value: unknown, method: string): bigint {
  if (typeof value !== 'bigint') {
    throw new Error(`[comet] ${method} returned non-integer value`);
  }
  return value;
}

export class CometRateSource implements RateSource {
  private readonly contract: Contract;

  constructor(readonly id: string, runner: ContractRunner) {
    this.contract = new Contract(id, COMET_ABI, runner);
  }

  async getUtilization(): Promise<bigint> {
    const value: unknown = await this.contract.getFunction('getUtilization')();
    return asBigInt(value, 'getUtilization');
  }

  async getSupplyRate(utilization: bigint): Promise<bigint> {
    const value: unknown = await this.contract.getFunction('getSupplyRate')(utilization);
    return asBigInt(value, 'getSupplyRate');
  }
}

export function cometRateSourceFactory(rpcUrl: string): RateSourceFactory {
  const provider = new JsonRpcProvider(rpcUrl);
  return (id: string) => new CometRateSource(id, provider);
}
