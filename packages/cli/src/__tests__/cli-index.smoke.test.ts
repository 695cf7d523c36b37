import { describe, it, expect, vi, beforeAll } from 'vitest';

// Mock commander to avoid real CLI execution side-effects
class FakeCommand {
  name(): this {
    return this;
  }
  description(): this {
    return this;
  }
  version(): this {
    return this;
  }
  option(): this {
    return this;
  }
  action(): this {
    return this;
  }
  parseAsync(): Promise<void> {
    return Promise.resolve();
  }
}

vi.mock('commander', () => ({ Command: FakeCommand }));

// Avoid accidental process.exit when error paths are exercised
beforeAll(() => {
  vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`process.exit(${String(code)}) intercepted in tests`);
  });
});

describe('CLI index smoke: imports without executing actions', () => {
  it('imports CLI module successfully with mocked commander', async () => {
    const mod = await import('../index');
    expect(mod.program).toBeInstanceOf(FakeCommand);
    await expect(mod.main(['node', 'pubgen'])).resolves.toBeUndefined();
  });
});
