/**
 * On-chain venue adapter gateway
 *
 * Talks to a venue adapter contract through ethers. Quotes are view calls.
 * State-changing calls are simulated first so a reverting call is never
 * sent. The amount returned is the one the mined transaction reports in its
 * PositionExecuted event.
 */

import {
  Contract,
  ContractRunner,
  ContractTransactionReceipt,
  encodeBytes32String,
  getAddress,
  isHexString,
} from 'ethers';
import type { Logger } from 'winston';
import { createComponentLogger, formatAmount } from '../utils/logger';
import { Quote, QuoteOptions, VenueGateway } from '../types';

/**
 * Venue adapter ABI (minimal interface)
 */
export const VENUE_ADAPTER_ABI = [
  'function getQuote(bytes32 market, bool isLong, uint256 margin, uint256 leverage) view returns (uint256 price, uint256 fee)',
  'function openPosition(bytes32 market, bool isLong, uint256 margin, uint256 leverage) returns (uint256 executedSize)',
  'function closePosition(bytes32 market, uint256 positionSize) returns (uint256 payout)',
  'function increasePosition(bytes32 market, uint256 additionalMargin, uint256 leverage) returns (uint256 additionalSize)',
  'function reducePosition(bytes32 market, uint256 sizeToReduce) returns (uint256 payout)',
  'event PositionExecuted(bytes32 indexed market, string action, uint256 amount)',
];

type AdapterMethod = 'openPosition' | 'closePosition' | 'increasePosition' | 'reducePosition';

export interface ContractVenueGatewayConfig {
  address: string;
  runner: ContractRunner;
  confirmations?: number;
  logger?: Logger;
}

/**
 * Encode a market identifier as bytes32
 */
export function encodeMarket(market: string): string {
  return isHexString(market, 32) ? market : encodeBytes32String(market);
}

export class ContractVenueGateway implements VenueGateway {
  readonly address: string;
  private adapter: Contract;
  private confirmations: number;
  private logger: Logger;

  constructor(config: ContractVenueGatewayConfig) {
    this.address = getAddress(config.address);
    this.adapter = new Contract(this.address, VENUE_ADAPTER_ABI, config.runner);
    this.confirmations = config.confirmations ?? 1;
    this.logger = config.logger ?? createComponentLogger('ContractVenueGateway', { venue: this.address });
  }

  async getQuote(
    market: string,
    isLong: boolean,
    margin: bigint,
    leverage: number,
    options: QuoteOptions = {}
  ): Promise<Quote> {
    options.signal?.throwIfAborted();
    const result = await this.adapter
      .getFunction('getQuote')
      .staticCall(encodeMarket(market), isLong, margin, BigInt(leverage));
    return { price: BigInt(result[0]), fee: BigInt(result[1]) };
  }

  openPosition(market: string, isLong: boolean, margin: bigint, leverage: number): Promise<bigint> {
    return this.execute('openPosition', encodeMarket(market), [isLong, margin, BigInt(leverage)]);
  }

  closePosition(market: string, positionSize: bigint): Promise<bigint> {
    return this.execute('closePosition', encodeMarket(market), [positionSize]);
  }

  increasePosition(market: string, additionalMargin: bigint, leverage: number): Promise<bigint> {
    return this.execute('increasePosition', encodeMarket(market), [additionalMargin, BigInt(leverage)]);
  }

  reducePosition(market: string, sizeToReduce: bigint): Promise<bigint> {
    return this.execute('reducePosition', encodeMarket(market), [sizeToReduce]);
  }

  private async execute(
    method: AdapterMethod,
    market: string,
    rest: Array<boolean | bigint>
  ): Promise<bigint> {
    const fn = this.adapter.getFunction(method);
    const args = [market, ...rest];

    const expected = BigInt(await fn.staticCall(...args));
    const tx = await fn.send(...args);
    this.logger.debug(`${method} submitted`, { txHash: tx.hash, expected: formatAmount(expected) });

    const receipt = await tx.wait(this.confirmations);
    if (!receipt || receipt.status !== 1) {
      throw new Error(`${method} reverted on venue ${this.address} (tx ${tx.hash})`);
    }

    const realised = this.readExecutedAmount(method, market, receipt);
    this.logger.info(`${method} confirmed`, {
      txHash: tx.hash,
      blockNumber: receipt.blockNumber,
      realised: formatAmount(realised),
      expected: formatAmount(expected),
    });
    return realised;
  }

  /**
   * Amount reported by this adapter's PositionExecuted event for the call
   */
  private readExecutedAmount(method: AdapterMethod, market: string, receipt: ContractTransactionReceipt): bigint {
    for (const log of receipt.logs) {
      if (getAddress(log.address) !== this.address) {
        continue;
      }
      const parsed = this.adapter.interface.parseLog(log);
      if (
        parsed?.name === 'PositionExecuted' &&
        String(parsed.args[0]).toLowerCase() === market.toLowerCase() &&
        parsed.args[1] === method
      ) {
        return BigInt(parsed.args[2]);
      }
    }
    throw new Error(`${method} on venue ${this.address} emitted no PositionExecuted event (tx ${receipt.hash})`);
  }
}
