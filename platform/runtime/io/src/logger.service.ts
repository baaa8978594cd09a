import { Inject, Injectable, Optional } from "@nestjs/common";
import fs from "fs";
import path from "path";
import pino, { type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig } from "@bundlekit/types";

export const LOGGING_CONFIG_TOKEN = Symbol("BUNDLEKIT_LOGGING_CONFIG");

const EMITTING_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

type EmittingLevel = (typeof EMITTING_LEVELS)[number];

export interface LoggerEvent {
  level: EmittingLevel;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

function isEmittingLevel(property: string | symbol): property is EmittingLevel {
  return EMITTING_LEVELS.some((level) => level === property);
}

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private cachedSignature = "";
  private readonly listeners = new Set<LoggerListener>();
  private readonly wrapped = new WeakSet<Logger>();

  constructor(
    @Optional()
    @Inject(LOGGING_CONFIG_TOKEN)
    private readonly defaults?: LoggingConfig,
  ) {}

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  configure(config?: LoggingConfig): Logger {
    const signature = JSON.stringify(config ?? {});
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    const rawLogger = this.buildLogger(config);
    this.rawLogger = rawLogger;
    this.rootLogger = this.wrapLogger(rawLogger);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    const root = this.rootLogger ?? this.configure(this.defaults);
    if (!scope) {
      return root;
    }
    const base = this.rawLogger ?? root;
    return this.wrapLogger(base.child({ scope }));
  }

  withBindings(bindings: Record<string, unknown>): Logger {
    return this.getLogger().child(bindings);
  }

  reset(): void {
    this.rootLogger = null;
    this.rawLogger = null;
    this.cachedSignature = "";
  }

  private resolvePrettyTransport(): LoggerOptions["transport"] {
    if (!process.stdout.isTTY) {
      return undefined;
    }

    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    };
  }

  private prepareFileDestination(file: string) {
    const filePath = path.resolve(file);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    return pino.destination({ dest: filePath, sync: true });
  }

  private buildLogger(config?: LoggingConfig): Logger {
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (config?.file) {
      return pino(options, this.prepareFileDestination(config.file));
    }

    // Silent loggers never write, so they skip the worker-thread transport.
    const transport =
      options.level === "silent" ? undefined : this.resolvePrettyTransport();
    if (transport) {
      options.transport = transport;
    }
    return pino(options);
  }

  private wrapLogger(logger: Logger): Logger {
    if (this.wrapped.has(logger)) {
      return logger;
    }

    const service = this;
    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (...args: Parameters<Logger["child"]>) =>
            service.wrapLogger(target.child<never>(...args));
        }

        const original: unknown = Reflect.get(target, property, receiver);
        if (!isEmittingLevel(property) || typeof original !== "function") {
          return original;
        }

        const level = property;
        const method = original;
        return (...args: unknown[]) => {
          service.notify(level, args);
          return method.apply(target, args);
        };
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(level: EmittingLevel, args: unknown[]): void {
    if (this.listeners.size === 0) {
      return;
    }

    const event: LoggerEvent = { level, args };
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
