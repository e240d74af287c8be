// Jest setup file

// Keep JSON log lines out of test output
process.env.LOG_LEVEL = 'SILENT';
