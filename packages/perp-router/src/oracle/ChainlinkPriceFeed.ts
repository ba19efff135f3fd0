/**
 * Chainlink Aggregator Price Feed
 *
 * Reads an AggregatorV3 contract and normalises its answer to the
 * router's 18-decimal price scale.
 *
 * Docs: https://docs.chain.link/data-feeds/api-reference
 */

import { Contract, ContractRunner, getAddress } from 'ethers';
import { RouterError, RouterErrorCode } from '../errors/RouterError';
import { PRICE_DECIMALS, PriceFeed, PriceObservation } from '../types';

/**
 * AggregatorV3Interface ABI (minimal interface)
 */
const AGGREGATOR_V3_ABI = [
  'function decimals() view returns (uint8)',
  'function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)',
];

export interface ChainlinkPriceFeedConfig {
  address: string;
  runner: ContractRunner;
  decimals?: number; // skips the decimals() lookup when known
}

export class ChainlinkPriceFeed implements PriceFeed {
  readonly id: string;
  private aggregator: Contract;
  private decimals?: number;

  constructor(config: ChainlinkPriceFeedConfig) {
    this.id = getAddress(config.address);
    this.aggregator = new Contract(this.id, AGGREGATOR_V3_ABI, config.runner);
    this.decimals = config.decimals;
  }

  async getLatestPrice(): Promise<PriceObservation> {
    const decimals = await this.getDecimals();
    const round = await this.aggregator.getFunction('latestRoundData').staticCall();
    const answer = BigInt(round[1]);
    const updatedAt = BigInt(round[3]);

    if (answer <= 0n) {
      throw new RouterError(RouterErrorCode.InvalidOraclePrice, `Aggregator ${this.id} returned a non-positive answer`, {
        feed: this.id,
        answer: answer.toString(),
      });
    }

    return {
      price: scaleToPriceDecimals(answer, decimals),
      observedAt: Number(updatedAt),
    };
  }

  private async getDecimals(): Promise<number> {
    if (this.decimals === undefined) {
      const value = await this.aggregator.getFunction('decimals').staticCall();
      this.decimals = Number(value);
    }
    return this.decimals;
  }
}

export function scaleToPriceDecimals(value: bigint, decimals: number): bigint {
  if (decimals === PRICE_DECIMALS) {
    return value;
  }
  if (decimals < PRICE_DECIMALS) {
    return value * 10n ** BigInt(PRICE_DECIMALS - decimals);
  }
  return value / 10n ** BigInt(decimals - PRICE_DECIMALS);
}
