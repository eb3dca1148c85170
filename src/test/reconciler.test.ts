import {
  DDNSError,
  ProviderError,
  Reconciler,
  RecordAbsentError,
  ResolutionError,
} from '../library/index.js';

import {FakeDDNSProvider, FakeIPResolver} from './@fakes.js';

const DOMAIN = 'home.example.com';

const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {});
const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {});
const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});

beforeEach(() => {
  consoleInfo.mockClear();
  consoleWarn.mockClear();
  consoleError.mockClear();
});

test('updates a stale record once', async () => {
  const provider = new FakeDDNSProvider({A: '192.0.2.1'});

  const reconciler = new Reconciler(
    new FakeIPResolver({ipv4: '192.0.2.9'}),
    provider,
    {domain: DOMAIN, families: ['ipv4']},
  );

  await expect(reconciler.reconcile()).resolves.toEqual([
    {type: 'updated', family: 'ipv4', from: '192.0.2.1', to: '192.0.2.9'},
  ]);

  expect(provider.applied).toEqual([[DOMAIN, 'A', '192.0.2.9', '192.0.2.1']]);
  expect(consoleInfo).toHaveBeenCalledTimes(2);

  await expect(reconciler.reconcile()).resolves.toEqual([
    {type: 'unchanged', family: 'ipv4', address: '192.0.2.9'},
  ]);

  expect(provider.applied).toHaveLength(1);
});

test('leaves an up to date record alone', async () => {
  const provider = new FakeDDNSProvider({AAAA: '2001:db8::1'});

  const reconciler = new Reconciler(
    new FakeIPResolver({ipv6: '2001:db8::1'}),
    provider,
    {domain: DOMAIN, families: ['ipv6']},
  );

  await expect(reconciler.reconcile()).resolves.toEqual([
    {type: 'unchanged', family: 'ipv6', address: '2001:db8::1'},
  ]);

  expect(provider.fetched).toEqual([[DOMAIN, 'AAAA']]);
  expect(provider.applied).toEqual([]);
  expect(consoleInfo).not.toHaveBeenCalled();
});

test('never creates a missing record', async () => {
  const provider = new FakeDDNSProvider({});

  const reconciler = new Reconciler(
    new FakeIPResolver({ipv4: '192.0.2.9'}),
    provider,
    {domain: DOMAIN, families: ['ipv4']},
  );

  const [outcome] = await reconciler.reconcile();

  expect(outcome).toEqual({
    type: 'failed',
    family: 'ipv4',
    error: new RecordAbsentError(DOMAIN, 'A'),
  });
  expect(outcome.type === 'failed' && outcome.error.severity).toBe(
    'permanent',
  );

  expect(provider.applied).toEqual([]);
  expect(consoleError).toHaveBeenCalledTimes(1);

  await reconciler.reconcile();

  expect(consoleError).toHaveBeenCalledTimes(2);
});

test('reconciles families independently', async () => {
  const provider = new FakeDDNSProvider({A: '192.0.2.1', AAAA: '2001:db8::1'});

  const reconciler = new Reconciler(
    new FakeIPResolver({
      ipv4: new ResolutionError('Every ipv4 source failed (a: boom).'),
      ipv6: '2001:db8::2',
    }),
    provider,
    {domain: DOMAIN, families: ['ipv4', 'ipv6']},
  );

  const outcomes = await reconciler.reconcile();

  expect(outcomes).toEqual([
    {
      type: 'failed',
      family: 'ipv4',
      error: new ResolutionError('Every ipv4 source failed (a: boom).'),
    },
    {type: 'updated', family: 'ipv6', from: '2001:db8::1', to: '2001:db8::2'},
  ]);

  expect(provider.fetched).toEqual([[DOMAIN, 'AAAA']]);
  expect(provider.applied).toEqual([
    [DOMAIN, 'AAAA', '2001:db8::2', '2001:db8::1'],
  ]);
  expect(consoleWarn).toHaveBeenCalledTimes(1);
  expect(consoleError).not.toHaveBeenCalled();
});

test('reports provider failures by severity', async () => {
  const provider = new FakeDDNSProvider({A: '192.0.2.1', AAAA: '2001:db8::1'});

  provider.applyErrors.A = new ProviderError('Server failed.', 'transient');
  provider.fetchErrors.AAAA = new ProviderError('Forbidden.', 'permanent');

  const reconciler = new Reconciler(
    new FakeIPResolver({ipv4: '192.0.2.9', ipv6: '2001:db8::2'}),
    provider,
    {domain: DOMAIN, families: ['ipv4', 'ipv6']},
  );

  const outcomes = await reconciler.reconcile();

  expect(outcomes.map(outcome => outcome.type)).toEqual(['failed', 'failed']);
  expect(consoleWarn).toHaveBeenCalledTimes(1);
  expect(consoleError).toHaveBeenCalledTimes(1);
  expect(provider.records).toEqual({A: '192.0.2.1', AAAA: '2001:db8::1'});
});

test('wraps unexpected errors as transient', async () => {
  const provider = new FakeDDNSProvider({A: '192.0.2.1'});

  provider.fetchErrors.A = new Error('boom');

  const reconciler = new Reconciler(
    new FakeIPResolver({ipv4: '192.0.2.9'}),
    provider,
    {domain: DOMAIN, families: ['ipv4']},
  );

  const [outcome] = await reconciler.reconcile();

  expect(outcome.type).toBe('failed');

  if (outcome.type === 'failed') {
    expect(outcome.error).toBeInstanceOf(DDNSError);
    expect(outcome.error.message).toBe('boom');
    expect(outcome.error.severity).toBe('transient');
  }
});
