import { ethers, BigNumber } from 'ethers';
import { erc20Interface } from './abis';
import { FakeChainClient, TEST_NETWORK } from './__fixtures__/fake-chain-client';
import { TransactionSender } from './transaction-sender';

const TOKEN = '0x1000000000000000000000000000000000000001';

function approveTx(gasPrice: BigNumber) {
  return {
    to: TOKEN,
    data: erc20Interface.encodeFunctionData('approve', [TEST_NETWORK.permit2, 1]),
    gasLimit: 100000,
    gasPrice,
  };
}

describe('TransactionSender', () => {
  let client: FakeChainClient;
  let sender: TransactionSender;

  beforeEach(() => {
    client = new FakeChainClient();
    client.addToken(TOKEN, { symbol: 'USDC', decimals: 6, balance: BigNumber.from(0) });
    sender = new TransactionSender(client);
  });

  it('reads the nonce fresh for every transaction', async () => {
    await sender.send(approveTx(client.gasPrice));
    await sender.send(approveTx(client.gasPrice));

    expect(client.sent.map(({ request }) => request.nonce)).toEqual([0, 1]);
    expect(client.log.filter((entry) => entry === 'getTransactionCount')).toHaveLength(2);
  });

  it('signs with the chain id and a zero value by default', async () => {
    const sent = await sender.send(approveTx(ethers.utils.parseUnits('5', 'gwei')));

    expect(sent).toEqual({ ok: true, value: client.sent[0].hash });
    const { request } = client.sent[0];
    expect(request.chainId).toBe(TEST_NETWORK.chainId);
    expect(BigNumber.from(request.value).isZero()).toBe(true);
    expect(request.gasPrice).toEqual(ethers.utils.parseUnits('5', 'gwei'));
  });

  it('reports SubmissionFailed when signing fails', async () => {
    client.failures.add('signTransaction');

    const sent = await sender.send(approveTx(client.gasPrice));

    expect(sent).toEqual({
      ok: false,
      error: { kind: 'SubmissionFailed', message: 'signTransaction failed', context: { to: TOKEN } },
    });
    expect(client.sent).toHaveLength(0);
  });

  it('tells confirmed, reverted and timed-out receipts apart', async () => {
    const first = await sender.send(approveTx(client.gasPrice));
    if (!first.ok) throw new Error(first.error.message);

    const confirmed = await sender.awaitConfirmation(first.value, 1000);
    expect(confirmed.ok && confirmed.value.status).toBe('confirmed');

    client.receiptModes.approve = 'revert';
    const reverted = await sender.awaitConfirmation(first.value, 1000);
    expect(reverted.ok && reverted.value.status).toBe('reverted');

    client.receiptModes.approve = 'timeout';
    const timedOut = await sender.awaitConfirmation(first.value, 1000);
    expect(timedOut).toEqual({ ok: true, value: { status: 'timeout' } });
  });
});
