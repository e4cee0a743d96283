export * from './bounded-queue.ts';
export * from './contracts.ts';
export * from './errors.ts';
export * from './sqlite.ts';
export * from './thread-store.ts';
export * from './turn-machine.ts';
