// Module stand-in for src/monitoring/logger, loaded through jest.mock
const createMockLogger = () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
});

export const logger = {
  ...createMockLogger(),
  child: jest.fn(() => createMockLogger()),
};

export const createContextLogger = jest.fn(() => createMockLogger());
