import { Global, Module } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import { RUNTIME_OPTIONS_TOKEN } from "@bundlekit/config";
import type { LoggingConfig, RuntimeOptions } from "@bundlekit/types";
import { createLoggerProvider } from "./logger.decorator";
import { LOGGING_CONFIG_TOKEN, LoggerService } from "./logger.service";

const rootLoggerProvider = createLoggerProvider();

const loggingConfigProvider: Provider = {
  provide: LOGGING_CONFIG_TOKEN,
  useFactory: (options?: RuntimeOptions): LoggingConfig => ({
    level: options?.logLevel ?? "info",
    file: options?.logFile,
  }),
  inject: [{ token: RUNTIME_OPTIONS_TOKEN, optional: true }],
};

@Global()
@Module({
  providers: [loggingConfigProvider, LoggerService, rootLoggerProvider],
  exports: [LoggerService, rootLoggerProvider],
})
export class IoModule {}
