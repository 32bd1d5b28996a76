import { describe, it, expect } from 'vitest';
import { ConnectionParseErrorCode, parseDockerHost } from '../connection-parser';

describe('parseDockerHost', () => {
  it('should parse unix sockets', () => {
    expect(parseDockerHost('unix:///run/docker.sock')).toEqual({
      success: true,
      data: { kind: 'socket', socketPath: '/run/docker.sock' },
    });
    expect(parseDockerHost('unix://')).toEqual({
      success: true,
      data: { kind: 'socket', socketPath: '/var/run/docker.sock' },
    });
  });

  it('should pick TLS for tcp addresses on 2376', () => {
    expect(parseDockerHost('tcp://10.0.0.5:2376')).toEqual({
      success: true,
      data: { kind: 'tcp', protocol: 'https', host: '10.0.0.5', port: 2376 },
    });
    expect(parseDockerHost('tcp://10.0.0.5:2375')).toEqual({
      success: true,
      data: { kind: 'tcp', protocol: 'http', host: '10.0.0.5', port: 2375 },
    });
  });

  it('should default the port from the scheme', () => {
    expect(parseDockerHost('https://swarm.internal')).toEqual({
      success: true,
      data: { kind: 'tcp', protocol: 'https', host: 'swarm.internal', port: 2376 },
    });
    expect(parseDockerHost('tcp://swarm.internal')).toEqual({
      success: true,
      data: { kind: 'tcp', protocol: 'http', host: 'swarm.internal', port: 2375 },
    });
  });

  it('should reject unsupported schemes and garbage', () => {
    const ssh = parseDockerHost('ssh://user@host');
    const garbage = parseDockerHost('not an address');

    expect(!ssh.success && ssh.error.code).toBe(ConnectionParseErrorCode.UNSUPPORTED_SCHEME);
    expect(!ssh.success && ssh.error.message).toBe('Unsupported daemon address scheme "ssh" in ssh://user@host');
    expect(!garbage.success && garbage.error.code).toBe(ConnectionParseErrorCode.INVALID_ADDRESS);
  });
});
