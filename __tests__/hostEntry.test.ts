jest.mock('dns/promises', () => {
  const mock = {
    lookup: jest.fn(),
    reverse: jest.fn(),
  };
  return {
    __esModule: true,
    default: mock,
    lookup: mock.lookup,
    reverse: mock.reverse,
  };
});

import dnsPromises from 'dns/promises';
import { NodeHostEntryResolver, pickCanonicalName } from '../lib/transports/hostEntry';

const dnsMock = dnsPromises as unknown as { lookup: jest.Mock; reverse: jest.Mock };

describe('pickCanonicalName', () => {
  test('a dotted query is already canonical', () => {
    expect(pickCanonicalName('web01.corp.example.com.', ['other.example.net'])).toBe('web01.corp.example.com');
  });

  test('a short name prefers the PTR name with the same first label', () => {
    expect(pickCanonicalName('WEB01', ['lb.corp.example.com', 'web01.corp.example.com'])).toBe('web01.corp.example.com');
  });

  test('a short name without PTR names stays as is', () => {
    expect(pickCanonicalName('web01', [])).toBe('web01');
  });

  test('an address takes its first PTR name', () => {
    expect(pickCanonicalName('10.0.0.7', ['fs01.corp.local'])).toBe('fs01.corp.local');
    expect(pickCanonicalName('10.0.0.7', [])).toBe('');
  });
});

describe('NodeHostEntryResolver', () => {
  beforeEach(() => jest.resetAllMocks());

  test('looks up addresses then names the host from PTR', async () => {
    dnsMock.lookup.mockResolvedValueOnce([{ address: '10.0.0.7', family: 4 }]);
    dnsMock.reverse.mockResolvedValueOnce(['web01.corp.example.com.', 'www.corp.example.com']);

    const entry = await new NodeHostEntryResolver().getHostEntry('web01', 1000);

    expect(entry).toEqual({
      hostName: 'web01.corp.example.com',
      aliases: ['www.corp.example.com'],
      addresses: ['10.0.0.7'],
    });
    expect(dnsMock.lookup).toHaveBeenCalledWith('web01', { all: true });
    expect(dnsMock.reverse).toHaveBeenCalledWith('10.0.0.7');
  });

  test('an IP literal skips the forward lookup', async () => {
    dnsMock.reverse.mockResolvedValueOnce(['fs01.corp.local']);

    const entry = await new NodeHostEntryResolver().getHostEntry('10.0.0.8', 1000);

    expect(entry.hostName).toBe('fs01.corp.local');
    expect(dnsMock.lookup).not.toHaveBeenCalled();
  });

  test('an IP literal without PTR records is not found', async () => {
    dnsMock.reverse.mockRejectedValueOnce(Object.assign(new Error('getHostByAddr ENOTFOUND'), { code: 'ENOTFOUND' }));

    await expect(new NodeHostEntryResolver().getHostEntry('10.0.0.9', 1000)).rejects.toThrow('no PTR record for 10.0.0.9');
  });

  test('forward lookup failures propagate to the strategy', async () => {
    dnsMock.lookup.mockRejectedValueOnce(Object.assign(new Error('getaddrinfo ENOTFOUND ghost'), { code: 'ENOTFOUND' }));

    await expect(new NodeHostEntryResolver().getHostEntry('ghost', 1000)).rejects.toThrow('getaddrinfo ENOTFOUND ghost');
  });
});
