/**
 * Tests for the graceful shutdown manager
 */

import { describe, it, expect, vi } from 'vitest';
import { GracefulShutdownManager } from '../../src/services/GracefulShutdown.js';

describe('GracefulShutdownManager', () => {
  it('should run handlers in registration order, then exit', async () => {
    const exit = vi.fn<(code: number) => void>();
    const manager = new GracefulShutdownManager(exit);
    const order: string[] = [];
    manager.register('http', async () => {
      order.push('http');
    });
    manager.register('app', async () => {
      order.push('app');
    });

    await manager.shutdown({ exitCode: 0 });

    expect(order).toEqual(['http', 'app']);
    expect(exit).toHaveBeenCalledWith(0);
    expect(manager.isInProgress()).toBe(true);
  });

  it('should keep going when a handler fails', async () => {
    const exit = vi.fn<(code: number) => void>();
    const manager = new GracefulShutdownManager(exit);
    const after = vi.fn(async () => {});
    manager.register('broken', async () => {
      throw new Error('socket busy');
    });
    manager.register('after', after);

    await manager.shutdown({ exitCode: 130 });

    expect(after).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(130);
  });

  it('should shut down only once', async () => {
    const exit = vi.fn<(code: number) => void>();
    const manager = new GracefulShutdownManager(exit);
    const handler = vi.fn(async () => {});
    manager.register('app', handler);

    await Promise.all([manager.shutdown(), manager.shutdown()]);

    expect(handler).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledTimes(1);
  });

  it('should skip unregistered handlers', async () => {
    const manager = new GracefulShutdownManager(vi.fn<(code: number) => void>());
    const handler = vi.fn(async () => {});
    manager.register('app', handler);
    manager.unregister('app');

    await manager.shutdown();

    expect(handler).not.toHaveBeenCalled();
  });
});
