/**
 * ConfigService double: returns the override for a key, else the caller's
 * default, like ConfigService.get(key, default) over an empty environment.
 */
export function configStub(overrides: Record<string, unknown> = {}) {
  return {
    get: jest.fn((key: string, fallback?: unknown) => (key in overrides ? overrides[key] : fallback)),
  };
}
