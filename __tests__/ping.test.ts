import { parsePingReply, pingArgs } from '../lib/transports/ping';

describe('parsePingReply', () => {
  test('reads the address from iputils output', () => {
    const out = [
      'PING web01.corp.local (10.0.0.5) 56(84) bytes of data.',
      '64 bytes from web01.corp.local (10.0.0.5): icmp_seq=1 ttl=128 time=0.412 ms',
      '',
      '--- web01.corp.local ping statistics ---',
      '1 packets transmitted, 1 received, 0% packet loss, time 0ms',
    ].join('\n');
    expect(parsePingReply(out)).toBe('10.0.0.5');
  });

  test('reads the address when pinging an IP directly', () => {
    expect(parsePingReply('64 bytes from 192.168.1.20: icmp_seq=1 ttl=64 time=1.02 ms\n')).toBe('192.168.1.20');
  });

  test('reads the address from Windows output', () => {
    const out = [
      '',
      'Pinging sql2016.corp.local [10.0.0.5] with 32 bytes of data:',
      'Reply from 10.0.0.5: bytes=32 time<1ms TTL=128',
      '',
    ].join('\r\n');
    expect(parsePingReply(out)).toBe('10.0.0.5');
  });

  test('no reply line means no address', () => {
    expect(parsePingReply('PING ghost (10.9.9.9) 56(84) bytes of data.\n\n1 packets transmitted, 0 received')).toBeUndefined();
    expect(parsePingReply('Reply from 10.0.0.1: Destination host unreachable.')).toBeUndefined();
  });
});

describe('pingArgs', () => {
  test('one echo with a whole-second wait on unix', () => {
    expect(pingArgs('web01', 1500, 'linux')).toEqual(['-c', '1', '-W', '2', 'web01']);
    expect(pingArgs('web01', 200, 'linux')).toEqual(['-c', '1', '-W', '1', 'web01']);
  });

  test('one IPv4 echo with a millisecond wait on Windows', () => {
    expect(pingArgs('web01', 1500, 'win32')).toEqual(['-n', '1', '-4', '-w', '1500', 'web01']);
  });
});
