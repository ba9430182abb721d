import { ethers, BigNumber } from 'ethers';
import { universalRouterInterface } from './abis';
import { AbiCoderStrategy, CommandBuilder } from './command-builder';
import { encodePath } from './path-encoder';
import { SwapOrchestrator } from './swap-orchestrator';
import { SwapIntent, SwapOutcome, SwapStage } from './types';
import { FakeChainClient, HOLDER, TEST_NETWORK } from './__fixtures__/fake-chain-client';

const USDC = '0x1000000000000000000000000000000000000001';
const WETH = '0x2000000000000000000000000000000000000002';
const NOW = 1700000000;
const QUOTED = BigNumber.from('3100000000000000');

const intent: SwapIntent = {
  tokenIn: USDC,
  tokenOut: WETH,
  amountIn: '10.0',
  slippagePercent: 0.5,
  fee: 3000,
};

function expectFailure(outcome: SwapOutcome) {
  if (outcome.success) {
    throw new Error('expected the swap to fail');
  }
  return outcome;
}

function expectSuccess(outcome: SwapOutcome) {
  if (!outcome.success) {
    throw new Error(`expected success, got ${outcome.error.kind}: ${outcome.error.message}`);
  }
  return outcome;
}

describe('SwapOrchestrator', () => {
  let client: FakeChainClient;
  let stages: SwapStage[];
  let logger: { log: jest.Mock; warn: jest.Mock; error: jest.Mock };
  let orchestrator: SwapOrchestrator;

  beforeEach(() => {
    client = new FakeChainClient();
    client.addToken(USDC, { symbol: 'USDC', decimals: 6, balance: BigNumber.from('20000000') });
    client.addToken(WETH, { symbol: 'WETH', decimals: 18, balance: BigNumber.from(0) });
    client.quotes.set(3000, QUOTED);

    stages = [];
    logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
    orchestrator = new SwapOrchestrator({
      client,
      network: TEST_NETWORK,
      commandBuilder: new CommandBuilder(new AbiCoderStrategy()),
      logger,
      now: () => NOW,
      confirmationTimeoutMs: 1000,
      onStageChange: (stage) => stages.push(stage),
    });
  });

  describe('happy path', () => {
    it('walks every stage and reports the confirmed swap', async () => {
      const outcome = expectSuccess(await orchestrator.execute(intent));

      expect(stages).toEqual([
        'Init',
        'InfoFetched',
        'BalanceChecked',
        'Approved',
        'Quoted',
        'PlanBuilt',
        'Submitted',
        'Confirmed',
      ]);
      expect(outcome.stage).toBe('Confirmed');
      expect(outcome.transactionHash).toBe(client.sent[1].hash);
      expect(outcome.blockNumber).toBe(101);
      expect(outcome.gasUsed.toNumber()).toBe(150000);
      expect(outcome.encoding).toBe('abi-coder');
      expect(outcome.expectedAmountOut.eq(QUOTED)).toBe(true);
    });

    it('builds the plan with exact amounts, recipient and deadline', async () => {
      const { plan } = expectSuccess(await orchestrator.execute(intent));

      expect(plan.tokenIn).toBe(USDC);
      expect(plan.tokenOut).toBe(WETH);
      expect(plan.amountIn.toString()).toBe('10000000');
      expect(plan.amountOutMinimum.toString()).toBe('3084500000000000');
      expect(plan.recipient).toBe(HOLDER);
      expect(plan.deadline).toBe(NOW + 1800);
      expect(plan.fee).toBe(3000);
      expect(Object.isFrozen(plan)).toBe(true);
    });

    it('submits execute() with fixed gas, marked-up gas price and no value', async () => {
      await orchestrator.execute(intent);

      expect(client.sent.map(({ method }) => method)).toEqual(['approve', 'execute']);
      const { request } = client.sent[1];
      expect(request.to).toBe(TEST_NETWORK.universalRouter);
      expect(request.gasLimit).toBe(300000);
      expect(BigNumber.from(request.gasPrice).toString()).toBe('22000000000');
      expect(BigNumber.from(request.value).isZero()).toBe(true);

      const decoded = universalRouterInterface.decodeFunctionData('execute', ethers.utils.hexlify(request.data ?? '0x'));
      expect(decoded.commands).toBe('0x00');
      expect(decoded.deadline.toNumber()).toBe(NOW + 1800);

      const [recipient, amountIn, amountOutMin, path, payerIsUser] = ethers.utils.defaultAbiCoder.decode(
        ['address', 'uint256', 'uint256', 'bytes', 'bool'],
        decoded.inputs[0]
      );
      const expectedPath = encodePath(USDC, 3000, WETH);
      if (!expectedPath.ok) throw new Error(expectedPath.error.message);

      expect(recipient).toBe(HOLDER);
      expect(amountIn.toString()).toBe('10000000');
      expect(amountOutMin.toString()).toBe('3084500000000000');
      expect(path).toBe(expectedPath.value);
      expect(payerIsUser).toBe(true);
    });

    it('approves Permit2 before quoting and quotes before submitting', async () => {
      await orchestrator.execute(intent);

      const approvalConfirmed = client.log.indexOf('wait:approve');
      const quoted = client.log.indexOf('call:quoteExactInputSingle');
      const submitted = client.log.indexOf('send:execute');

      expect(approvalConfirmed).toBeGreaterThan(-1);
      expect(quoted).toBeGreaterThan(approvalConfirmed);
      expect(submitted).toBeGreaterThan(quoted);
      expect(client.allowanceOf(USDC, TEST_NETWORK.permit2).eq(ethers.constants.MaxUint256)).toBe(true);
    });

    it('skips the approval when Permit2 is already allowed', async () => {
      client.addToken(USDC, {
        symbol: 'USDC',
        decimals: 6,
        balance: BigNumber.from('20000000'),
        allowances: { [TEST_NETWORK.permit2]: ethers.constants.MaxUint256 },
      });

      await orchestrator.execute(intent);

      expect(client.sent.map(({ method }) => method)).toEqual(['execute']);
    });

    it('refreshes both balances after confirmation', async () => {
      const { balances } = expectSuccess(await orchestrator.execute(intent));

      expect(balances?.tokenIn.symbol).toBe('USDC');
      expect(balances?.tokenIn.formatted).toBe('10.0');
      expect(balances?.tokenOut.symbol).toBe('WETH');
      expect(balances?.tokenOut.raw.toString()).toBe('3100000000000000');
      expect(balances?.tokenOut.formatted).toBe('0.0031');
    });

    it('stays successful when the balance refresh fails', async () => {
      client.failBalanceReadsAfterSwap = true;

      const outcome = expectSuccess(await orchestrator.execute(intent));

      expect(outcome.balances).toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith('⚠️  Swap confirmed but balances could not be refreshed');
    });
  });

  describe('failures before anything is sent', () => {
    it('stops at Init when the node is unreachable', async () => {
      client.connected = false;

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('Init');
      expect(outcome.error.kind).toBe('ConnectivityError');
      expect(client.log).toEqual(['isConnected']);
    });

    it('stops at Init when a token cannot be read', async () => {
      const unknown = '0x3000000000000000000000000000000000000003';

      const outcome = expectFailure(await orchestrator.execute({ ...intent, tokenOut: unknown }));

      expect(outcome.stage).toBe('Init');
      expect(outcome.error).toEqual({
        kind: 'TokenInfoUnavailable',
        message: 'execution reverted',
        context: { token: unknown },
      });
    });

    it('rejects malformed token addresses without calling them', async () => {
      const outcome = expectFailure(await orchestrator.execute({ ...intent, tokenIn: '0xnot-an-address' }));

      expect(outcome.error.kind).toBe('TokenInfoUnavailable');
      expect(outcome.error.message).toBe('Not a token address: 0xnot-an-address');
      expect(client.log).toEqual(['isConnected']);
    });

    it('reports InsufficientBalance without approving or submitting', async () => {
      client.addToken(USDC, { symbol: 'USDC', decimals: 6, balance: BigNumber.from('5000000') });

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('InfoFetched');
      expect(outcome.error).toEqual({
        kind: 'InsufficientBalance',
        message: 'Insufficient USDC balance',
        context: { token: USDC, holder: HOLDER, balance: '5000000', required: '10000000' },
      });
      expect(client.sent).toHaveLength(0);
      expect(client.log).not.toContain('call:quoteExactInputSingle');
    });

    it.each([
      ['slippage of 100%', { slippagePercent: 100 }, 'InvalidIntent'],
      ['negative slippage', { slippagePercent: '-0.5' }, 'InvalidIntent'],
      ['fee wider than uint24', { fee: 2 ** 24 }, 'EncodingError'],
    ])('rejects a %s at Init', async (_label, override, kind) => {
      const outcome = expectFailure(await orchestrator.execute({ ...intent, ...override }));

      expect(outcome.stage).toBe('Init');
      expect(outcome.error.kind).toBe(kind);
      expect(client.log).toEqual([]);
    });

    it('rejects an unparseable amount once decimals are known', async () => {
      const outcome = expectFailure(await orchestrator.execute({ ...intent, amountIn: 'ten' }));

      expect(outcome.stage).toBe('InfoFetched');
      expect(outcome.error.kind).toBe('InvalidIntent');
    });

    it('stops at BalanceChecked when the approval reverts', async () => {
      client.receiptModes.approve = 'revert';

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('BalanceChecked');
      expect(outcome.error.kind).toBe('ApprovalFailed');
      expect(client.log).not.toContain('call:quoteExactInputSingle');
      expect(client.sent.map(({ method }) => method)).toEqual(['approve']);
    });

    it('stops at Approved when no quote is available', async () => {
      client.quotes.clear();

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('Approved');
      expect(outcome.error.kind).toBe('QuoteUnavailable');
      expect(client.sent.map(({ method }) => method)).toEqual(['approve']);
    });

    it('reports SubmissionFailed when the swap cannot be broadcast', async () => {
      client.failures.add('send:execute');

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('PlanBuilt');
      expect(outcome.error.kind).toBe('SubmissionFailed');
      expect(outcome.transactionHash).toBeUndefined();
    });
  });

  describe('failures after submission', () => {
    it('reports TransactionReverted when the receipt has a failed status', async () => {
      client.receiptModes.execute = 'revert';

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('Submitted');
      expect(outcome.error.kind).toBe('TransactionReverted');
      expect(outcome.error.context).toEqual({
        transactionHash: client.sent[1].hash,
        gasUsed: '150000',
        encoding: 'abi-coder',
      });
      expect(outcome.transactionHash).toBe(client.sent[1].hash);
    });

    it('reports ConfirmationTimeout, not a revert, when no receipt arrives', async () => {
      client.receiptModes.execute = 'timeout';

      const outcome = expectFailure(await orchestrator.execute(intent));

      expect(outcome.stage).toBe('Submitted');
      expect(outcome.error.kind).toBe('ConfirmationTimeout');
      expect(outcome.error.message).toBe(
        'No receipt within 1s; outcome unknown, the transaction may still be mined'
      );
      expect(outcome.transactionHash).toBe(client.sent[1].hash);
    });
  });

  it('turns unexpected exceptions into an UnexpectedError outcome', async () => {
    const failing = new SwapOrchestrator({
      client,
      network: TEST_NETWORK,
      commandBuilder: new CommandBuilder(new AbiCoderStrategy()),
      logger,
      now: () => {
        throw new Error('clock unavailable');
      },
    });

    const outcome = expectFailure(await failing.execute(intent));

    expect(outcome.stage).toBe('Quoted');
    expect(outcome.error).toEqual({
      kind: 'UnexpectedError',
      message: 'clock unavailable',
      context: { stage: 'Quoted' },
    });
    expect(logger.error).toHaveBeenCalledWith('\n❌ Swap failed at Quoted: UnexpectedError: clock unavailable');
  });

  it('returns a failure when the stage observer throws on Init', async () => {
    const observed = new SwapOrchestrator({
      client,
      network: TEST_NETWORK,
      commandBuilder: new CommandBuilder(new AbiCoderStrategy()),
      logger,
      onStageChange: () => {
        throw new Error('observer failed');
      },
    });

    const outcome = expectFailure(await observed.execute(intent));

    expect(outcome.stage).toBe('Init');
    expect(outcome.error).toEqual({
      kind: 'UnexpectedError',
      message: 'observer failed',
      context: { stage: 'Init' },
    });
    expect(client.log).toEqual([]);
  });
});
