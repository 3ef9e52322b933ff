import { Global, Module } from '@nestjs/common';
import { ConfigService } from '../config/config.service.js';
import { FileLogger } from './file-logger.js';

@Global()
@Module({
  providers: [
    {
      provide: FileLogger,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        new FileLogger('NestApplication', {
          logFilePath: config.logFile,
          levels: config.logLevels,
          mirrorToConsole: config.logToConsole,
        }),
    },
  ],
  exports: [FileLogger],
})
export class LoggingModule {}
