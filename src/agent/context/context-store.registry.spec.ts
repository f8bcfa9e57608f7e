import { DEFAULT_ASSISTANT_CONFIG } from '../../config/assistant.config';
import { ContextStoreRegistry } from './context-store.registry';

describe('ContextStoreRegistry', () => {
  let registry: ContextStoreRegistry;

  beforeEach(() => {
    registry = new ContextStoreRegistry({
      ...DEFAULT_ASSISTANT_CONFIG,
      historyCapacity: 8,
      sessionTtlMs: 1000,
    });
  });

  it('returns the same session for the same id', () => {
    const first = registry.getOrCreate('kitchen', 0);
    const again = registry.getOrCreate('kitchen', 500);

    expect(again).toBe(first);
    expect(again.lastActiveAt).toBe(500);
    expect(first.store.capacity).toBe(8);
  });

  it('keeps sessions apart', () => {
    const kitchen = registry.getOrCreate('kitchen', 0);
    const office = registry.getOrCreate('office', 0);

    expect(office.store).not.toBe(kitchen.store);
    expect(registry.size).toBe(2);
  });

  it('evicts idle sessions after the TTL', () => {
    registry.getOrCreate('kitchen', 0);
    registry.getOrCreate('office', 2000);

    expect(registry.has('kitchen')).toBe(false);
    expect(registry.has('office')).toBe(true);
  });

  it('keeps a session whose turn is still running', async () => {
    const kitchen = registry.getOrCreate('kitchen', 0);
    let finish: () => void = () => undefined;
    const running = kitchen.lease.use(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        }),
    );

    registry.getOrCreate('office', 5000);
    expect(registry.has('kitchen')).toBe(true);

    await new Promise((resolve) => setImmediate(resolve));
    finish();
    await running;
  });
});
