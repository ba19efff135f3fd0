import {
  AbstractProvider,
  ContractRunner,
  decodeBytes32String,
  id,
  Interface,
  Signature,
  TransactionReceipt,
  TransactionRequest,
  TransactionResponse,
} from 'ethers';
import { ContractVenueGateway, encodeMarket, VENUE_ADAPTER_ABI } from '../ContractVenueGateway';
import { e18, MARKET, silentLogger, USER, VENUE_A, VENUE_B } from '../../__tests__/fixtures';

const adapter = new Interface(VENUE_ADAPTER_ABI);
const BLOCK = 19_000_000;
const BLOCK_HASH = id('block');

/**
 * Serves the receipts of transactions the fake adapter has mined
 */
class ReceiptProvider extends AbstractProvider {
  receipts: Map<string, TransactionReceipt> = new Map();

  async getTransactionReceipt(hash: string): Promise<null | TransactionReceipt> {
    return this.receipts.get(hash) ?? null;
  }

  async getBlockNumber(): Promise<number> {
    return BLOCK;
  }
}

interface AdapterState {
  simulated: bigint;
  realised: bigint;
  status: number | null;
  emitted: boolean;
  emitter: string;
  simulationError?: Error;
  sent: string[];
}

/**
 * Simulates, mines and logs adapter calls in process
 */
function adapterRunner(state: AdapterState): ContractRunner {
  const provider = new ReceiptProvider();

  return {
    provider,
    call: async (tx: TransactionRequest): Promise<string> => {
      if (state.simulationError) {
        throw state.simulationError;
      }
      const parsed = adapter.parseTransaction({ data: tx.data ?? '0x' });
      if (!parsed) {
        throw new Error('unknown selector');
      }
      return adapter.encodeFunctionResult(parsed.name, [state.simulated]);
    },
    sendTransaction: async (tx: TransactionRequest): Promise<TransactionResponse> => {
      const data = tx.data ?? '0x';
      const parsed = adapter.parseTransaction({ data });
      if (!parsed) {
        throw new Error('unknown selector');
      }
      state.sent.push(parsed.name);
      const hash = id(`tx-${state.sent.length}`);

      const event = adapter.encodeEventLog('PositionExecuted', [parsed.args[0], parsed.name, state.realised]);
      const logs = state.emitted
        ? [
            {
              transactionHash: hash,
              blockHash: BLOCK_HASH,
              blockNumber: BLOCK,
              removed: false,
              address: state.emitter,
              data: event.data,
              topics: event.topics,
              index: 0,
              transactionIndex: 0,
            },
          ]
        : [];
      const receipt = {
        to: VENUE_A,
        from: USER,
        contractAddress: null,
        hash,
        index: 0,
        blockHash: BLOCK_HASH,
        blockNumber: BLOCK,
        logsBloom: '0x' + '00'.repeat(256),
        logs,
        gasUsed: 21_000n,
        cumulativeGasUsed: 21_000n,
        gasPrice: 1n,
        type: 2,
        status: state.status,
        root: null,
      };
      provider.receipts.set(hash, new TransactionReceipt(receipt, provider));

      const response = {
        blockNumber: null,
        blockHash: null,
        hash,
        index: 0,
        type: 2,
        to: VENUE_A,
        from: USER,
        nonce: state.sent.length - 1,
        gasLimit: 500_000n,
        gasPrice: 1n,
        maxPriorityFeePerGas: 1n,
        maxFeePerGas: 1n,
        maxFeePerBlobGas: null,
        data,
        value: 0n,
        chainId: 1n,
        signature: Signature.from({ r: '0x' + '11'.repeat(32), s: '0x' + '22'.repeat(32), v: 27 }),
        accessList: [],
        blobVersionedHashes: null,
        authorizationList: null,
      };
      return new TransactionResponse(response, provider);
    },
  };
}

describe('encodeMarket', () => {
  test('encodes a symbol as a bytes32 string', () => {
    const encoded = encodeMarket(MARKET);
    expect(encoded).toHaveLength(66);
    expect(decodeBytes32String(encoded)).toBe(MARKET);
  });

  test('passes a 32-byte hex id through', () => {
    const id = '0x' + 'ab'.repeat(32);
    expect(encodeMarket(id)).toBe(id);
  });
});

describe('ContractVenueGateway.getQuote', () => {
  let requests: TransactionRequest[];
  let runner: ContractRunner;

  beforeEach(() => {
    requests = [];
    runner = {
      provider: null,
      call: async (tx: TransactionRequest): Promise<string> => {
        requests.push(tx);
        return adapter.encodeFunctionResult('getQuote', [e18(2000), e18(2)]);
      },
    };
  });

  test('returns price and fee from the adapter view call', async () => {
    const gateway = new ContractVenueGateway({ address: VENUE_A, runner, logger: silentLogger });

    await expect(gateway.getQuote(MARKET, true, e18(1000), 5)).resolves.toEqual({ price: e18(2000), fee: e18(2) });
  });

  test('encodes the market, side, margin and leverage', async () => {
    const gateway = new ContractVenueGateway({ address: VENUE_A, runner, logger: silentLogger });

    await gateway.getQuote(MARKET, false, e18(250), 20);

    expect(requests).toHaveLength(1);
    const parsed = adapter.parseTransaction({ data: requests[0].data ?? '0x' });
    expect(parsed?.name).toBe('getQuote');
    expect(decodeBytes32String(parsed?.args[0])).toBe(MARKET);
    expect(parsed?.args[1]).toBe(false);
    expect(parsed?.args[2]).toBe(e18(250));
    expect(parsed?.args[3]).toBe(20n);
  });

  test('does not call the adapter once the signal is aborted', async () => {
    const gateway = new ContractVenueGateway({ address: VENUE_A, runner, logger: silentLogger });
    const controller = new AbortController();
    controller.abort();

    await expect(gateway.getQuote(MARKET, true, e18(1), 1, { signal: controller.signal })).rejects.toBeDefined();
    expect(requests).toHaveLength(0);
  });
});

describe('ContractVenueGateway execution', () => {
  let state: AdapterState;
  let gateway: ContractVenueGateway;

  beforeEach(() => {
    state = {
      simulated: e18(5),
      realised: e18(5),
      status: 1,
      emitted: true,
      emitter: VENUE_A,
      sent: [],
    };
    gateway = new ContractVenueGateway({ address: VENUE_A, runner: adapterRunner(state), logger: silentLogger });
  });

  test('returns the amount the mined transaction reports', async () => {
    state.realised = e18(4);

    await expect(gateway.openPosition(MARKET, true, e18(1000), 10)).resolves.toBe(e18(4));
    expect(state.sent).toEqual(['openPosition']);
  });

  test('reads the event for each execution method', async () => {
    state.realised = e18(7);

    await expect(gateway.closePosition(MARKET, e18(1))).resolves.toBe(e18(7));
    await expect(gateway.increasePosition(MARKET, e18(10), 3)).resolves.toBe(e18(7));
    await expect(gateway.reducePosition(MARKET, e18(1))).resolves.toBe(e18(7));
    expect(state.sent).toEqual(['closePosition', 'increasePosition', 'reducePosition']);
  });

  test('does not send a call whose simulation reverts', async () => {
    state.simulationError = new Error('insufficient margin');

    await expect(gateway.openPosition(MARKET, true, e18(1), 2)).rejects.toThrow('insufficient margin');
    expect(state.sent).toEqual([]);
  });

  test('fails when the receipt has no status', async () => {
    state.status = null;

    await expect(gateway.openPosition(MARKET, true, e18(1), 2)).rejects.toThrow(
      `openPosition reverted on venue ${VENUE_A} (tx ${id('tx-1')})`
    );
  });

  test('fails when the transaction reverted on chain', async () => {
    state.status = 0;

    await expect(gateway.openPosition(MARKET, true, e18(1), 2)).rejects.toThrow();
    expect(state.sent).toEqual(['openPosition']);
  });

  test('fails when the execution event is missing', async () => {
    state.emitted = false;

    await expect(gateway.reducePosition(MARKET, e18(1))).rejects.toThrow(
      `reducePosition on venue ${VENUE_A} emitted no PositionExecuted event (tx ${id('tx-1')})`
    );
  });

  test('ignores execution events from other contracts', async () => {
    state.emitter = VENUE_B;

    await expect(gateway.closePosition(MARKET, e18(1))).rejects.toThrow('emitted no PositionExecuted event');
  });
});
