/**
 * Job queue tests (memory and file backends)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { FileJobQueue, MemoryJobQueue, createJobQueue } from '../../src/queue/index.js';
import { ConfigurationError, InternalError } from '../../src/core/errors.js';
import { loadFromFile } from '../../src/store/persistence.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'relay-queue-'));
});

afterEach(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('MemoryJobQueue', () => {
  it('should deliver jobs in FIFO order', async () => {
    const queue = new MemoryJobQueue();
    await queue.enqueue('t1');
    await queue.enqueue('t2');

    expect(await queue.size()).toBe(2);
    expect((await queue.dequeue())?.taskId).toBe('t1');
    expect((await queue.dequeue())?.taskId).toBe('t2');
    expect(await queue.size()).toBe(0);
  });

  it('should count deliveries and track in-flight jobs until ack', async () => {
    const queue = new MemoryJobQueue();
    await queue.enqueue('t1');

    const job = await queue.dequeue();
    expect(job?.deliveries).toBe(1);
    expect(queue.inFlightCount()).toBe(1);

    await queue.ack(job?.id ?? '');
    expect(queue.inFlightCount()).toBe(0);
  });

  it('should redeliver a nacked job', async () => {
    const queue = new MemoryJobQueue();
    await queue.enqueue('t1');

    const first = await queue.dequeue();
    await queue.nack(first?.id ?? '');
    const second = await queue.dequeue();

    expect(second?.id).toBe(first?.id);
    expect(second?.deliveries).toBe(2);
  });

  it('should wake a waiting consumer on enqueue', async () => {
    const queue = new MemoryJobQueue();

    const waiting = queue.dequeue();
    await queue.enqueue('t1');

    expect((await waiting)?.taskId).toBe('t1');
  });

  it('should resolve null when the signal aborts', async () => {
    const queue = new MemoryJobQueue();
    const controller = new AbortController();

    const waiting = queue.dequeue(controller.signal);
    controller.abort();

    expect(await waiting).toBeNull();

    // The aborted consumer no longer claims jobs
    await queue.enqueue('t1');
    expect(await queue.size()).toBe(1);
  });

  it('should release waiters and refuse new jobs once closed', async () => {
    const queue = new MemoryJobQueue();
    const waiting = queue.dequeue();

    await queue.close();

    expect(await waiting).toBeNull();
    expect(await queue.ping()).toBe(false);
    await expect(queue.enqueue('t1')).rejects.toThrow('Queue is closed');
  });
});

describe('FileJobQueue', () => {
  const open = (file: string, visibilityTimeoutMs = 60_000) =>
    FileJobQueue.open(file, { pollIntervalMs: 10, visibilityTimeoutMs });

  it('should deliver in FIFO order and redeliver a nacked job last', async () => {
    const queue = await open(path.join(tmpDir, 'queue.json'));
    await queue.enqueue('t1');
    await queue.enqueue('t2');

    const first = await queue.dequeue();
    await queue.nack(first?.id ?? '');

    expect((await queue.dequeue())?.taskId).toBe('t2');
    const again = await queue.dequeue();
    expect(again?.taskId).toBe('t1');
    expect(again?.deliveries).toBe(2);
  });

  it('should hand back its unacknowledged deliveries when closed', async () => {
    const file = path.join(tmpDir, 'queue.json');
    const first = await open(file);
    await first.enqueue('delivered-not-acked');
    await first.enqueue('acked');
    await first.enqueue('never-delivered');

    const a = await first.dequeue();
    const b = await first.dequeue();
    await first.ack(b?.id ?? '');
    expect(a?.taskId).toBe('delivered-not-acked');
    await first.close();

    const second = await open(file);
    const redelivered = [await second.dequeue(), await second.dequeue()];

    expect(redelivered.map((job) => job?.taskId)).toEqual(['delivered-not-acked', 'never-delivered']);
    expect(redelivered[0]?.deliveries).toBe(2);
    expect(await second.size()).toBe(0);
  });

  it('should redeliver a job whose consumer never settled it', async () => {
    const file = path.join(tmpDir, 'queue.json');
    const crashed = await open(file, 20);
    await crashed.enqueue('t1');
    const held = await crashed.dequeue();

    const survivor = await open(file, 20);
    const redelivered = await survivor.dequeue();

    expect(redelivered?.id).toBe(held?.id);
    expect(redelivered?.deliveries).toBe(2);
  });

  it('should persist the unsettled set as a versioned document', async () => {
    const file = path.join(tmpDir, 'queue.json');
    const queue = await open(file);
    await queue.enqueue('t1');

    const document = await loadFromFile(file);
    expect(document).toMatchObject({
      version: 1,
      jobs: [{ taskId: 't1', deliveries: 0, state: 'ready', deliveredAt: null, consumer: null }],
    });
  });

  it('should resolve null when the signal aborts or the queue closes', async () => {
    const queue = await open(path.join(tmpDir, 'queue.json'));
    const controller = new AbortController();

    const aborted = queue.dequeue(controller.signal);
    controller.abort();
    expect(await aborted).toBeNull();

    const waiting = queue.dequeue();
    await queue.close();
    expect(await waiting).toBeNull();
    expect(await queue.ping()).toBe(false);
    await expect(queue.enqueue('t1')).rejects.toThrow('Queue is closed');
  });

  it('should refuse a malformed document', async () => {
    const file = path.join(tmpDir, 'queue.json');
    await fs.writeFile(file, JSON.stringify({ version: 1, jobs: [{ id: 'x' }] }), 'utf-8');

    await expect(FileJobQueue.open(file)).rejects.toBeInstanceOf(InternalError);
  });
});

describe('FileJobQueue shared between processes', () => {
  it('should deliver a job enqueued by one instance to a consumer waiting in another', async () => {
    const file = path.join(tmpDir, 'queue.json');
    const worker = await FileJobQueue.open(file, { pollIntervalMs: 10 });
    const api = await FileJobQueue.open(file, { pollIntervalMs: 10 });

    const waiting = worker.dequeue();
    await api.enqueue('api-task');

    expect((await waiting)?.taskId).toBe('api-task');
    expect(await api.size()).toBe(0);
  });

  it('should hand each job to exactly one of several instances', async () => {
    const file = path.join(tmpDir, 'queue.json');
    const api = await FileJobQueue.open(file, { pollIntervalMs: 10 });
    const workers = [
      await FileJobQueue.open(file, { pollIntervalMs: 10 }),
      await FileJobQueue.open(file, { pollIntervalMs: 10 }),
    ];
    for (const taskId of ['t1', 't2', 't3', 't4']) {
      await api.enqueue(taskId);
    }

    const delivered = await Promise.all([
      workers[0].dequeue(),
      workers[1].dequeue(),
      workers[0].dequeue(),
      workers[1].dequeue(),
    ]);

    expect(delivered.map((job) => job?.taskId).sort()).toEqual(['t1', 't2', 't3', 't4']);
    expect(delivered.every((job) => job?.deliveries === 1)).toBe(true);
  });

  it('should keep jobs enqueued by one instance when another acknowledges its own', async () => {
    const file = path.join(tmpDir, 'queue.json');
    const worker = await FileJobQueue.open(file, { pollIntervalMs: 10 });
    const api = await FileJobQueue.open(file, { pollIntervalMs: 10 });

    await worker.enqueue('first');
    const job = await worker.dequeue();
    await api.enqueue('second');
    await worker.ack(job?.id ?? '');

    expect(await api.size()).toBe(1);
    expect(await loadFromFile(file)).toMatchObject({ jobs: [{ taskId: 'second', state: 'ready' }] });
  });
});

describe('createJobQueue', () => {
  it('should pick the backend from the URL scheme', async () => {
    expect(await createJobQueue('memory://')).toBeInstanceOf(MemoryJobQueue);
    expect(await createJobQueue(`file://${path.join(tmpDir, 'q.json')}`)).toBeInstanceOf(FileJobQueue);
  });

  it('should reject unknown schemes', async () => {
    await expect(createJobQueue('amqp://localhost')).rejects.toBeInstanceOf(ConfigurationError);
  });
});
