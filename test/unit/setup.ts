import 'reflect-metadata';

// Keep the config layer away from any local .env file
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'silent';
