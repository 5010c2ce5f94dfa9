// Module loggers read this before initLogger() ever runs
process.env.LOG_LEVEL = 'silent';
