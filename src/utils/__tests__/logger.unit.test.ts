import path from 'path';
import winston from 'winston';
import { COMBINED_LOG_FILE, ERROR_LOG_FILE, logger } from '../logger';
import { config } from '../../config';

describe('logger utility', () => {
  describe('logger instance', () => {
    it('should be a winston logger instance', () => {
      expect(logger).toBeInstanceOf(winston.Logger);
    });

    it('should use the configured level', () => {
      expect(logger.level).toBe(config.logging.level);
    });

    it('should define the http level between info and debug', () => {
      const { levels } = logger;
      expect(levels.error).toBeLessThan(levels.warn);
      expect(levels.warn).toBeLessThan(levels.info);
      expect(levels.info).toBeLessThan(levels.http);
      expect(levels.http).toBeLessThan(levels.debug);
    });
  });

  describe('transports', () => {
    it('should have a console transport', () => {
      const hasConsoleTransport = logger.transports.some(
        (transport) => transport instanceof winston.transports.Console
      );
      expect(hasConsoleTransport).toBe(true);
    });

    it('should write errors and combined output to separate files in the log directory', () => {
      const files = logger.transports.filter(
        (transport): transport is winston.transports.FileTransportInstance =>
          transport instanceof winston.transports.File
      );

      expect(files).toHaveLength(2);
      expect(ERROR_LOG_FILE).toBe(path.resolve(config.logging.dir, 'error.log'));
      expect(COMBINED_LOG_FILE).toBe(path.resolve(config.logging.dir, 'combined.log'));

      const errorTransport = files.find((transport) => transport.filename === 'error.log');
      expect(errorTransport?.level).toBe('error');
      expect(files.map((transport) => transport.filename).sort()).toEqual([
        'combined.log',
        'error.log',
      ]);
    });

    it('should rotate files by size', () => {
      const files = logger.transports.filter(
        (transport): transport is winston.transports.FileTransportInstance =>
          transport instanceof winston.transports.File
      );

      for (const transport of files) {
        expect(transport.maxsize).toBe(config.logging.maxFileSize);
        expect(transport.maxFiles).toBe(config.logging.maxFiles);
      }
    });
  });

  describe('logging functionality', () => {
    beforeEach(() => {
      logger.transports.forEach((transport) => {
        transport.silent = true;
      });
    });

    afterEach(() => {
      logger.transports.forEach((transport) => {
        transport.silent = false;
      });
    });

    it('should log at every level', () => {
      expect(() => {
        logger.error('Test error message');
        logger.warn('Test warning message');
        logger.info('Test info message');
        logger.http('Test http message');
        logger.debug('Test debug message');
      }).not.toThrow();
    });

    it('should log messages with metadata', () => {
      expect(() => {
        logger.info('Device registered', { mac: 'AA:BB:CC:DD:EE:FF' });
      }).not.toThrow();
    });

    it('should log error objects', () => {
      expect(() => {
        logger.error('Error occurred', { error: new Error('Test error') });
      }).not.toThrow();
    });
  });
});
