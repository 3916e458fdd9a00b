// src/tests/setup.ts
process.env.NODE_ENV = 'test';

jest.setTimeout(30000);
