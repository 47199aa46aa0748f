import { createLogger } from '../logging/logger';
import { serializeError } from '../logging/error-serializer';
import { parsePositiveInt } from '../config/env-utils';

const logger = createLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

export type ShutdownPhase = 'drain' | 'schedulers' | 'queues' | 'connections' | 'default';

const PHASE_ORDER: ShutdownPhase[] = ['drain', 'schedulers', 'queues', 'connections', 'default'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label?: string;
}

const phasedHooks: PhasedHook[] = [];
let isShuttingDown = false;

export function registerShutdownHook(hook: ShutdownHook, label?: string): void {
  registerPhasedShutdownHook('default', hook, label);
}

export function registerPhasedShutdownHook(phase: ShutdownPhase, hook: ShutdownHook, label?: string): void {
  phasedHooks.push({ phase, hook, label });
  logger.debug('Registered phased shutdown hook', { phase, label });
}

/**
 * Run every registered hook phase by phase. A failing hook is logged and the
 * remaining hooks still run.
 */
export async function runShutdownHooks(): Promise<void> {
  for (const phase of PHASE_ORDER) {
    const phaseHooks = phasedHooks.filter(h => h.phase === phase);
    if (phaseHooks.length === 0) continue;

    logger.info(`Executing shutdown phase: ${phase}`, { hookCount: phaseHooks.length });
    for (const { hook, label } of phaseHooks) {
      try {
        await hook();
        if (label) logger.debug(`Shutdown hook completed: ${label}`);
      } catch (e) {
        logger.error('Phased shutdown hook failed', { phase, label, error: serializeError(e) });
      }
    }
  }
}

export function setupGracefulShutdown(timeoutMs?: number): void {
  const timeout = timeoutMs ?? parsePositiveInt('SHUTDOWN_TIMEOUT_MS', 10000);

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown (timeout: ${timeout}ms)`);

    const timer = setTimeout(() => {
      logger.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, timeout);
    timer.unref();

    await runShutdownHooks();
    logger.info('Graceful shutdown complete');
    clearTimeout(timer);
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

/**
 * Test helper: forget registered hooks and reset the shutdown flag.
 */
export function resetShutdownHooks(): void {
  phasedHooks.length = 0;
  isShuttingDown = false;
}
