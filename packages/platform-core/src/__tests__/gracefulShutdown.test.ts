import { describe, it, expect, afterEach } from 'vitest';
import { registerPhasedShutdownHook, registerShutdownHook, resetShutdownHooks, runShutdownHooks } from '../lifecycle/gracefulShutdown';

describe('runShutdownHooks', () => {
  afterEach(() => {
    resetShutdownHooks();
  });

  it('should run hooks in phase order regardless of registration order', async () => {
    const order: string[] = [];
    registerShutdownHook(async () => {
      order.push('default');
    });
    registerPhasedShutdownHook('connections', async () => {
      order.push('connections');
    });
    registerPhasedShutdownHook('drain', async () => {
      order.push('drain');
    });

    await runShutdownHooks();

    expect(order).toEqual(['drain', 'connections', 'default']);
  });

  it('should keep running hooks after one fails', async () => {
    const order: string[] = [];
    registerPhasedShutdownHook('drain', async () => {
      throw new Error('drain failed');
    });
    registerPhasedShutdownHook('queues', async () => {
      order.push('queues');
    });

    await runShutdownHooks();

    expect(order).toEqual(['queues']);
  });
});
