import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';

const logger = getLogger('graceful-shutdown');

type ShutdownHook = () => Promise<void>;

/** drain: stop accepting work; connections: close pools and clients */
export type ShutdownPhase = 'drain' | 'connections';

const PHASE_ORDER: ShutdownPhase[] = ['drain', 'connections'];

interface PhasedHook {
  phase: ShutdownPhase;
  hook: ShutdownHook;
  label: string;
}

export class GracefulShutdown {
  private readonly hooks: PhasedHook[] = [];
  private shuttingDown = false;

  register(phase: ShutdownPhase, label: string, hook: ShutdownHook): this {
    this.hooks.push({ phase, hook, label });
    logger.debug('Registered shutdown hook', { phase, label });
    return this;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  /**
   * Run every hook phase by phase. A failing hook is logged and does not stop
   * the others. Resolves false when any hook failed; a second call is a no-op.
   */
  async run(signal: string): Promise<boolean> {
    if (this.shuttingDown) return true;
    this.shuttingDown = true;
    logger.info(`Received ${signal}, starting graceful shutdown`);

    let clean = true;
    for (const phase of PHASE_ORDER) {
      for (const { hook, label } of this.hooks.filter(h => h.phase === phase)) {
        try {
          await hook();
          logger.debug(`Shutdown hook completed: ${label}`);
        } catch (error) {
          clean = false;
          logger.error('Shutdown hook failed', { phase, label, error: serializeError(error) });
        }
      }
    }

    logger.info('Graceful shutdown complete', { clean });
    return clean;
  }

  /**
   * Wire SIGTERM/SIGINT to run() and exit the process afterwards
   */
  install(timeoutMs = parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '10000', 10)): void {
    const onSignal = (signal: string) => {
      const timer = setTimeout(() => {
        logger.error('Graceful shutdown timed out, forcing exit');
        process.exit(1);
      }, timeoutMs);

      this.run(signal)
        .then(clean => {
          clearTimeout(timer);
          process.exit(clean ? 0 : 1);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error: serializeError(error) });
          process.exit(1);
        });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
  }
}
