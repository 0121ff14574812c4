import { describe, test, expect } from 'vitest';
import { readFile } from 'node:fs/promises';

const readJson = async (relativePath: string): Promise<unknown> =>
  JSON.parse(await readFile(new URL(relativePath, import.meta.url), 'utf8'));

describe('ビルド設定', () => {
  test('ビルドはsrcだけをdistに出力する', async () => {
    const buildConfig = await readJson('../../tsconfig.build.json');

    expect(buildConfig).toMatchObject({
      extends: './tsconfig.json',
      compilerOptions: { rootDir: 'src', outDir: 'dist' },
      include: ['src']
    });
  });

  test('buildスクリプトと実行ファイルはビルド設定の出力を指す', async () => {
    const packageJson = await readJson('../../package.json');

    expect(packageJson).toMatchObject({
      bin: { 'cgpa-grade-book': 'dist/main.js' },
      main: 'dist/main.js',
      scripts: { build: 'tsc -p tsconfig.build.json', start: 'node dist/main.js' }
    });
  });
});
