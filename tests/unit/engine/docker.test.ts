/**
 * Tests for the dockerode-backed image listing.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type Docker from 'dockerode';
import {
  createEngineClient,
  fromEngineImages,
  listEngineImages,
  toDockerOptions,
  type ImageListingClient,
} from '../../../src/engine/docker.js';
import { EngineUnavailableError, MalformedInputError } from '../../../src/utils/errors.js';
import { NONE_TAG } from '../../../src/core/images/types.js';

const dockerConstructor = vi.hoisted(() => vi.fn());

vi.mock('dockerode', () => ({
  default: class {
    constructor(...args: unknown[]) {
      dockerConstructor(...args);
    }
  },
}));

function engineImage(fields: { Id: string; ParentId: string; RepoTags: string[] | undefined; VirtualSize: number }): Docker.ImageInfo {
  const info = {
    ...fields,
    Created: 1700000000,
    Size: fields.VirtualSize,
    SharedSize: -1,
    Labels: {},
    Containers: -1,
  };
  return info;
}

function clientReturning(images: Docker.ImageInfo[]): ImageListingClient {
  return { listImages: vi.fn(async () => images) };
}

function clientFailing(error: Error): ImageListingClient {
  return {
    listImages: vi.fn(async () => {
      throw error;
    }),
  };
}

describe('toDockerOptions', () => {
  it('should prefer the socket path', () => {
    expect(toDockerOptions({ socket_path: '/run/engine.sock', host: '10.0.0.1', port: 2375 })).toEqual({
      socketPath: '/run/engine.sock',
    });
  });

  it('should use host and port', () => {
    expect(toDockerOptions({ host: '10.0.0.1', port: 2375 })).toEqual({ host: '10.0.0.1', port: 2375 });
    expect(toDockerOptions({ host: '10.0.0.1' })).toEqual({ host: '10.0.0.1' });
  });

  it('should leave defaults to dockerode when nothing is configured', () => {
    expect(toDockerOptions({})).toBeUndefined();
  });
});

describe('createEngineClient', () => {
  beforeEach(() => {
    dockerConstructor.mockClear();
  });

  it('should pass configured options to dockerode', () => {
    createEngineClient({ socket_path: '/run/engine.sock' });

    expect(dockerConstructor).toHaveBeenCalledWith({ socketPath: '/run/engine.sock' });
  });

  it('should construct dockerode without options by default', () => {
    createEngineClient({});

    expect(dockerConstructor).toHaveBeenCalledWith();
  });
});

describe('fromEngineImages', () => {
  it('should translate engine entries into image records', () => {
    const records = fromEngineImages([
      engineImage({ Id: 'sha256:parent', ParentId: '', RepoTags: ['base:latest'], VirtualSize: 2000 }),
      engineImage({ Id: 'sha256:child', ParentId: 'sha256:parent', RepoTags: undefined, VirtualSize: 3000 }),
    ]);

    expect(records).toEqual([
      { id: 'sha256:parent', parentId: '', repoTags: ['base:latest'], virtualSize: 2000, size: 2000, created: 1700000000 },
      { id: 'sha256:child', parentId: 'sha256:parent', repoTags: [NONE_TAG], virtualSize: 3000, size: 3000, created: 1700000000 },
    ]);
  });
});

describe('listEngineImages', () => {
  const originalInDocker = process.env.IN_DOCKER;

  afterEach(() => {
    if (originalInDocker === undefined) {
      delete process.env.IN_DOCKER;
    } else {
      process.env.IN_DOCKER = originalInDocker;
    }
  });

  it('should request every image including intermediates', async () => {
    const client = clientReturning([
      engineImage({ Id: 'sha256:one', ParentId: '', RepoTags: ['one:1'], VirtualSize: 10 }),
    ]);

    const records = await listEngineImages({}, client);

    expect(client.listImages).toHaveBeenCalledWith({ all: true });
    expect(records.map((record) => record.id)).toEqual(['sha256:one']);
  });

  it('should raise EngineUnavailableError when the engine cannot be reached', async () => {
    delete process.env.IN_DOCKER;
    const client = clientFailing(new Error('connect ENOENT /var/run/docker.sock'));

    await expect(listEngineImages({}, client)).rejects.toThrow(EngineUnavailableError);
    await expect(listEngineImages({}, client)).rejects.toThrow(
      "Unable to connect: connect ENOENT /var/run/docker.sock\nFor help, run 'layerviz help'"
    );
  });

  it('should explain socket mounting when running inside a container', async () => {
    process.env.IN_DOCKER = '1';
    const client = clientFailing(new Error('connect EACCES'));

    await expect(listEngineImages({}, client)).rejects.toThrow(
      /-v \/var\/run\/docker\.sock:\/var\/run\/docker\.sock layerviz images <args>/
    );
  });

  it('should reject entries without an id', async () => {
    const client = clientReturning([
      engineImage({ Id: '', ParentId: '', RepoTags: undefined, VirtualSize: 0 }),
    ]);

    await expect(listEngineImages({}, client)).rejects.toThrow(MalformedInputError);
  });
});
