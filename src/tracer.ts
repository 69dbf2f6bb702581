import otel, { Span, SpanStatusCode } from '@opentelemetry/api';
import apm from 'elastic-apm-node';
import { readConfig, ZooConfig } from './config';
import { logger } from './log';
import { getVersion } from './version';

const ServiceName = 'zoo-fetch';

export const ot = { trace: otel.trace, context: otel.context };

type ApmAgent = ReturnType<typeof apm.start>;

class TraceControl {
  agent?: ApmAgent;
  tracer = ot.trace.getTracer(ServiceName, getVersion().version ?? 'unknown');
  rootSpan?: Span;
  isStarted = false;

  /** Export spans to an APM server, only when one is configured */
  private setup(cfg: ZooConfig['telemetry']): void {
    if (cfg.disabled) return logger.debug('$TELEMETRY_DISABLED is set, skipping trace');
    if (cfg.endpoint == null) return logger.trace('$ZOO_TELEMETRY_ENDPOINT missing, skipping trace');
    if (cfg.token == null) return logger.warn('$ZOO_TELEMETRY_TOKEN missing, skipping trace');

    this.agent = apm.start({
      serviceName: ServiceName,
      serviceVersion: getVersion().version ?? 'unknown',
      serverUrl: cfg.endpoint,
      secretToken: cfg.token,
      opentelemetryBridgeEnabled: true,
    });

    process.once('SIGINT', () => {
      logger.info('Ctrl+C Shutting down');
      if (this.rootSpan) {
        this.rootSpan.setAttribute('interrupted', true);
        this.rootSpan.end();
      }
      this.shutdown()
        .catch((err) => logger.error({ err }, 'Telemetry:Shutdown:Failed'))
        .finally(() => process.exit(130));
    });
    this.isStarted = true;
    logger.debug('Telemetry:Setup:Done');
  }

  /** Start a root span that traces a whole command */
  startRootSpan<T>(name: string, cb: (s: Span) => Promise<T>): Promise<T> {
    if (this.rootSpan) throw new Error('Duplicate root span');
    logger.info({ command: { package: ServiceName, cmd: name, ...getVersion() } }, 'Command:Start');

    return this.tracer.startActiveSpan(name, async (span) => {
      this.rootSpan = span;
      try {
        return await cb(span);
      } catch (e) {
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw e;
      } finally {
        span.end();
        this.rootSpan = undefined;
      }
    });
  }

  /** Start a span off from the top level span if it exists */
  startSpan(name: string): Span {
    if (this.rootSpan == null) return this.tracer.startSpan(name);
    return this.tracer.startSpan(name, undefined, ot.trace.setSpan(ot.context.active(), this.rootSpan));
  }

  _shutdown: Promise<void> | null = null;
  private shutdown(): Promise<void> {
    if (this._shutdown == null) {
      this._shutdown = (async (): Promise<void> => {
        const agent = this.agent;
        if (agent == null) return;
        await new Promise<void>((resolve) => agent.flush(() => resolve()));
        await agent.destroy();
      })();
    }
    return this._shutdown;
  }

  /** Run a command, logging any failure and turning it into a non zero exit code */
  async run(cb: () => Promise<unknown>, cfg: ZooConfig = readConfig()): Promise<void> {
    this.setup(cfg.telemetry);
    try {
      await cb();
    } catch (e) {
      if (this.rootSpan && e instanceof Error) this.rootSpan.recordException(e);
      logger.fatal({ err: e }, 'Command:Failed');
      process.exitCode = 1;
    } finally {
      logger.trace('Telemetry:Sync');
      await this.shutdown();
      logger.debug('Telemetry:Sync:Done');
    }
  }
}

export const Tracer = new TraceControl();
