import * as fs from 'fs';
import * as path from 'path';

/**
 * Domain Purity Test
 *
 * src/domain/ holds record types, name matching and query validation. It
 * must not reach the transport, the logger, services or the HTTP layer.
 */

const DOMAIN_DIR = path.resolve(__dirname, '..');
const FORBIDDEN_PATTERNS = [
  /from\s+['"].*logger/,
  /from\s+['"].*integrations/,
  /from\s+['"].*modules/,
  /from\s+['"].*middleware/,
  /from\s+['"]axios['"]/,
  /from\s+['"]express['"]/,
  /import\s+['"].*logger/,
  /import\s+['"].*integrations/,
  /import\s+['"]axios['"]/,
];

function getAllTsFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '__tests__') continue;
      files.push(...getAllTsFiles(fullPath));
    } else if (entry.name.endsWith('.ts') && !entry.name.endsWith('.test.ts')) {
      files.push(fullPath);
    }
  }

  return files;
}

describe('Domain purity', () => {
  it('finds the domain sources', () => {
    const names = getAllTsFiles(DOMAIN_DIR).map((file) => path.basename(file));
    expect(names).toEqual(expect.arrayContaining(['records.ts', 'name-matching.ts', 'stat-query.ts']));
  });

  it('should not contain impure imports in src/domain/', () => {
    const violations: string[] = [];

    for (const filePath of getAllTsFiles(DOMAIN_DIR)) {
      const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
      const relativePath = path.relative(DOMAIN_DIR, filePath);

      lines.forEach((line, i) => {
        if (FORBIDDEN_PATTERNS.some((pattern) => pattern.test(line))) {
          violations.push(`${relativePath}:${i + 1}: ${line.trim()}`);
        }
      });
    }

    expect(violations).toEqual([]);
  });
});
