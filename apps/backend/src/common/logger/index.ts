export { LoggerModule } from './logger.module';
export { LoggerService, LogLevel, type LogContext } from './logger.service';
