// Keep test output quiet unless a run asks for logs
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
