import 'reflect-metadata';

// Keep unit and e2e runs independent of the developer's shell environment
process.env.NODE_ENV = 'test';
