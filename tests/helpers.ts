import { DiscoveryService, Reflector } from '@nestjs/core';
import { MachineRegistry } from '../src/services/machine-registry.service';
import { IMachineDbAdapter } from '../src/interfaces/machine-db-adapter.interface';

export function createMockRegistry(): MachineRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new MachineRegistry(mockDiscovery, mockReflector);
}

export function createMockAdapter(): jest.Mocked<IMachineDbAdapter> {
  const mockAdapter: jest.Mocked<IMachineDbAdapter> = {
    findOne: jest.fn().mockResolvedValue(null),
    insert: jest.fn().mockResolvedValue(true),
    compareAndSet: jest.fn().mockResolvedValue(true),
    insertHistory: jest.fn().mockResolvedValue(undefined),
    findHistoryByKey: jest.fn().mockResolvedValue(null),
    findExpired: jest.fn().mockResolvedValue([]),
    findByState: jest.fn().mockResolvedValue([]),
    findChildren: jest.fn().mockResolvedValue([]),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockAdapter)),
  };
  return mockAdapter;
}

/** Promise whose settlement the test controls. */
export function deferred<T = void>(): {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
} {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets every already-queued promise callback run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
