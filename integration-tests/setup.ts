// Keep test output readable; set LOG_LEVEL=debug to see strategy traces
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
