import Docker from 'dockerode';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { ErrorCode } from '../../utils/errors';
import { FilterSet } from '../../utils/filters';
import { DockerSwarmClient, toDockerError, toDockerOptions } from '../docker-swarm-client';

function daemonError(message: string): Error {
  return Object.assign(new Error(`(HTTP code 404) unexpected - ${message}`), {
    statusCode: 404,
    json: { message },
  });
}

describe('toDockerOptions', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should map sockets and tcp addresses', () => {
    vi.stubEnv('DOCKER_CERT_PATH', '');

    expect(toDockerOptions({ kind: 'socket', socketPath: '/run/docker.sock' })).toEqual({
      socketPath: '/run/docker.sock',
    });
    expect(toDockerOptions({ kind: 'tcp', protocol: 'https', host: '10.0.0.5', port: 2376 })).toEqual({
      host: '10.0.0.5',
      port: 2376,
      protocol: 'https',
    });
  });
});

describe('toDockerError', () => {
  it('should keep the daemon message', () => {
    const error = toDockerError(daemonError('config foo not found'));

    expect(error.message).toBe('Error response from daemon: config foo not found');
    expect(error.code).toBe(ErrorCode.DOCKER_REQUEST_FAILED);
  });

  it('should explain an unreachable daemon', () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 10.0.0.5:2375'), { code: 'ECONNREFUSED' });
    const error = toDockerError(refused);

    expect(error.message).toBe('Cannot connect to the Docker daemon: connect ECONNREFUSED 10.0.0.5:2375');
    expect(error.code).toBe(ErrorCode.DOCKER_NOT_AVAILABLE);
  });

  it('should fall back to the original message', () => {
    expect(toDockerError(new Error('socket hang up')).message).toBe('socket hang up');
    expect(toDockerError('plain').message).toBe('plain');
  });
});

describe('DockerSwarmClient', () => {
  it('should send filters as the JSON query parameter', async () => {
    const docker = new Docker({ socketPath: '/nonexistent/docker.sock' });
    const listServices = vi.spyOn(docker, 'listServices').mockRejectedValue(daemonError('This node is not a swarm manager.'));
    const client = new DockerSwarmClient(docker);

    await expect(client.listServices(new FilterSet().add('label', 'com.docker.stack.namespace=foo'))).rejects.toThrow(
      'Error response from daemon: This node is not a swarm manager.'
    );
    expect(listServices).toHaveBeenCalledWith({ filters: '{"label":["com.docker.stack.namespace=foo"]}' });
  });

  it('should report inspect failures with the daemon message', async () => {
    const docker = new Docker({ socketPath: '/nonexistent/docker.sock' });
    const config = docker.getConfig('foo');
    vi.spyOn(docker, 'getConfig').mockReturnValue(config);
    vi.spyOn(config, 'inspect').mockRejectedValue(daemonError('config foo not found'));
    const client = new DockerSwarmClient(docker);

    await expect(client.inspectConfig('foo')).rejects.toThrow('Error response from daemon: config foo not found');
  });
});
