import { existsSync } from 'fs';
import { resolveAssetPath } from './asset-path';

describe('resolveAssetPath', () => {
  it('should find an asset next to the module sources', () => {
    const path = resolveAssetPath('database', 'schema.sql');

    expect(path.endsWith('schema.sql')).toBe(true);
    expect(existsSync(path)).toBe(true);
  });

  it('should throw for an unknown asset', () => {
    expect(() => resolveAssetPath('database', 'missing.sql')).toThrow(
      'Missing database asset: missing.sql',
    );
  });
});
