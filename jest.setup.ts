// Keep pino quiet unless a test run asks for output.
process.env['LOG_LEVEL'] = process.env['LOG_LEVEL'] ?? 'silent';
