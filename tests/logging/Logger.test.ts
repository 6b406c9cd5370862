import { LogLevel, LogOutput, Logger, parseLogLevel, parseLogOutput } from '../../src/Logger';


describe('Logger', () => {
    let consoleLog: jest.SpyInstance;

    beforeEach(() => {
        consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        consoleLog.mockRestore();
    });

    test('drops messages below the configured level', () => {
        const logger = new Logger(LogLevel.Warn, LogOutput.Console, '');

        logger.debug('debug message');
        logger.info('info message');
        logger.warn('warn message');

        expect(consoleLog).toHaveBeenCalledTimes(1);
        expect(consoleLog.mock.calls[0][0]).toMatch(/^\[WARN\] \d{4}-\d{2}-\d{2}T[\d:.]+Z - warn message$/);
    });

    test('logs nothing at level none', () => {
        const logger = new Logger(LogLevel.None, LogOutput.Console, '');

        logger.error('error message');

        expect(consoleLog).not.toHaveBeenCalled();
    });

    test('prefixes messages with the context label', () => {
        const logger = new Logger(LogLevel.Debug, LogOutput.Console, '').withContext('session #1 127.0.0.1:5000');

        logger.info('New connection', 42);

        expect(consoleLog.mock.calls[0][0]).toMatch(/ - \[session #1 127\.0\.0\.1:5000\] New connection$/);
        expect(consoleLog.mock.calls[0][1]).toBe(42);
    });

    test('parses level and output names, falling back to defaults', () => {
        expect(parseLogLevel('DEBUG')).toBe(LogLevel.Debug);
        expect(parseLogLevel('verbose')).toBe(LogLevel.Info);
        expect(parseLogLevel(null)).toBe(LogLevel.Info);
        expect(parseLogOutput('both')).toBe(LogOutput.Both);
        expect(parseLogOutput(undefined)).toBe(LogOutput.Console);
    });
});
