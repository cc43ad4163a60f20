jest.mock('../lib/metrics', () => ({
  incStrategyAttempt: jest.fn(),
}));

import { attemptStrategy, resolveIdentity, UNKNOWN_IDENTITY } from '../lib/resolver';
import { StrategyError } from '../lib/errors';
import { incStrategyAttempt } from '../lib/metrics';
import { createCimStrategy } from '../lib/strategies/cim';
import { FakeSession, fakeSessionFactory, fakeStrategy } from './fakes';
import type { ComputerSystemRow, IdentityRecord, IdentityStrategy } from '../lib/types';

const mockIncStrategyAttempt = incStrategyAttempt as jest.MockedFunction<typeof incStrategyAttempt>;

const refused = () => Object.assign(new Error('connect ECONNREFUSED'), { code: 'ECONNREFUSED' });

const identity: IdentityRecord = { name: 'SQL2016', dnsHostName: 'sql2016', domain: 'corp.local' };

describe('resolveIdentity', () => {
  beforeEach(() => jest.clearAllMocks());

  test('stops at the first strategy that succeeds', async () => {
    const wsman = fakeStrategy('cim-wsman', identity);
    const dcom = fakeStrategy('cim-dcom', { name: 'OTHER' });
    const wmi = fakeStrategy('wmi-legacy', { name: 'OTHER' });
    const dns = fakeStrategy('dns', { name: 'OTHER' });

    const res = await resolveIdentity('sql2016', {
      strategies: [wsman, dcom, wmi, dns],
      instrumentationAvailable: true,
      timeoutMs: 1000,
    });

    expect(res).toEqual(identity);
    expect(wsman.lookup).toHaveBeenCalledTimes(1);
    expect(dcom.lookup).not.toHaveBeenCalled();
    expect(wmi.lookup).not.toHaveBeenCalled();
    expect(dns.lookup).not.toHaveBeenCalled();
    expect(mockIncStrategyAttempt).toHaveBeenCalledWith('cim-wsman', 'success');
  });

  test('falls through in order, each strategy tried once', async () => {
    const calls: string[] = [];
    const track = (s: ReturnType<typeof fakeStrategy>) => {
      const original = s.lookup.getMockImplementation();
      s.lookup.mockImplementation(async (host, ctx) => {
        calls.push(s.name);
        if (!original) throw new Error('no implementation');
        return original(host, ctx);
      });
      return s;
    };
    const wsman = track(fakeStrategy('cim-wsman', refused()));
    const dcom = track(fakeStrategy('cim-dcom', new Error('Access is denied.')));
    const wmi = track(fakeStrategy('wmi-legacy', identity));
    const dns = track(fakeStrategy('dns', { name: 'x' }));

    const res = await resolveIdentity('sql2016', {
      strategies: [wsman, dcom, wmi, dns],
      instrumentationAvailable: true,
      timeoutMs: 1000,
    });

    expect(res).toEqual(identity);
    expect(calls).toEqual(['cim-wsman', 'cim-dcom', 'wmi-legacy']);
    expect(mockIncStrategyAttempt.mock.calls).toEqual([
      ['cim-wsman', 'connection'],
      ['cim-dcom', 'authentication'],
      ['wmi-legacy', 'success'],
    ]);
  });

  test('skips instrumentation strategies when they cannot run here', async () => {
    const wsman = fakeStrategy('cim-wsman', identity);
    const dns = fakeStrategy('dns', { name: 'web01', dnsHostName: 'web01', domain: 'corp.example.com' });

    const res = await resolveIdentity('web01', {
      strategies: [wsman, dns],
      instrumentationAvailable: false,
      timeoutMs: 1000,
    });

    expect(wsman.lookup).not.toHaveBeenCalled();
    expect(res).toEqual({ name: 'web01', dnsHostName: 'web01', domain: 'corp.example.com' });
  });

  test('returns the empty record when every strategy fails', async () => {
    const strategies = [
      fakeStrategy('cim-wsman', refused()),
      fakeStrategy('cim-dcom', refused()),
      fakeStrategy('wmi-legacy', refused()),
      fakeStrategy('dns', Object.assign(new Error('queryA ENOTFOUND'), { code: 'ENOTFOUND' })),
    ];

    const res = await resolveIdentity('ghost', { strategies, instrumentationAvailable: true, timeoutMs: 1000 });

    expect(res).toBe(UNKNOWN_IDENTITY);
    expect(res).toEqual({});
    expect(mockIncStrategyAttempt).toHaveBeenLastCalledWith('dns', 'not-found');
  });

  test('forwards the credential unchanged to each strategy', async () => {
    const credential = { username: 'CORP\\svc', password: 'test-secret' };
    const wsman = fakeStrategy('cim-wsman', refused());
    const wmi = fakeStrategy('wmi-legacy', identity);

    await resolveIdentity('sql2016', {
      strategies: [wsman, wmi],
      instrumentationAvailable: true,
      credential,
      timeoutMs: 1000,
    });

    expect(wsman.lookup).toHaveBeenCalledWith('sql2016', { credential, timeoutMs: 1000 });
    expect(wmi.lookup.mock.calls[0][1].credential).toBe(credential);
  });

  test('does not start strategies after the signal aborts', async () => {
    const controller = new AbortController();
    const wsman = fakeStrategy('cim-wsman', refused());
    wsman.lookup.mockImplementationOnce(async () => {
      controller.abort();
      throw refused();
    });
    const dns = fakeStrategy('dns', identity);

    const res = await resolveIdentity('sql2016', {
      strategies: [wsman, dns],
      instrumentationAvailable: true,
      timeoutMs: 1000,
      signal: controller.signal,
    });

    expect(res).toEqual({});
    expect(dns.lookup).not.toHaveBeenCalled();
  });
});

describe('resolveIdentity with a hung management session', () => {
  beforeEach(() => jest.clearAllMocks());

  test('closes the session before the next strategy starts', async () => {
    const session = new FakeSession(() => new Promise<ComputerSystemRow>(() => undefined));
    const wsman = createCimStrategy('cim-wsman', 'wsman', fakeSessionFactory(session));
    let closedWhenDnsStarted = -1;
    const dns = fakeStrategy('dns', identity);
    dns.lookup.mockImplementation(async () => {
      closedWhenDnsStarted = session.close.mock.calls.length;
      return identity;
    });

    const res = await resolveIdentity('sql2016', {
      strategies: [wsman, dns],
      instrumentationAvailable: true,
      timeoutMs: 50,
      graceMs: 5000,
    });

    expect(res).toEqual(identity);
    expect(closedWhenDnsStarted).toBe(1);
    expect(mockIncStrategyAttempt).toHaveBeenCalledWith('cim-wsman', 'timeout');
  });

  test('the session is closed before the resolver returns when it was the last strategy', async () => {
    const session = new FakeSession(() => new Promise<ComputerSystemRow>(() => undefined));
    const wsman = createCimStrategy('cim-wsman', 'wsman', fakeSessionFactory(session));

    const res = await resolveIdentity('sql2016', {
      strategies: [wsman],
      instrumentationAvailable: true,
      timeoutMs: 50,
      graceMs: 5000,
    });

    expect(res).toBe(UNKNOWN_IDENTITY);
    expect(session.close).toHaveBeenCalledTimes(1);
  });
});

describe('attemptStrategy', () => {
  test('a strategy that never settles is cut off after its grace period', async () => {
    jest.useFakeTimers();
    try {
      const hung: IdentityStrategy = {
        name: 'cim-wsman',
        requiresInstrumentation: true,
        lookup: () => new Promise<IdentityRecord>(() => undefined),
      };
      const pending = attemptStrategy(hung, 'sql2016', { timeoutMs: 50, graceMs: 20 });
      await jest.advanceTimersByTimeAsync(80);
      await expect(pending).resolves.toEqual({
        ok: false,
        strategy: 'cim-wsman',
        reason: 'timeout',
        message: 'cim-wsman timed out after 70ms',
      });
    } finally {
      jest.useRealTimers();
    }
  });

  test('a strategy-level timeout overrides the shared one', async () => {
    const dns = { ...fakeStrategy('dns', identity), timeoutMs: 250 };
    await attemptStrategy(dns, 'web01', { timeoutMs: 5000 });
    expect(dns.lookup).toHaveBeenCalledWith('web01', { credential: undefined, timeoutMs: 250 });
  });

  test('keeps the reason carried by a StrategyError', async () => {
    const empty = fakeStrategy('wmi-legacy', new StrategyError('empty-result', 'no rows'));
    await expect(attemptStrategy(empty, 'h', { timeoutMs: 100 })).resolves.toEqual({
      ok: false,
      strategy: 'wmi-legacy',
      reason: 'empty-result',
      message: 'no rows',
    });
  });
});
