/**
 * 設定ファイル探索・読み込みテスト
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import * as E from 'fp-ts/Either';
import { DEFAULT_PROTECTED_PATTERNS } from '@thanos-snap/config-schemas';
import {
  MAX_SEARCH_LEVELS,
  findConfigFile,
  loadProtectionPatterns,
  loadWeightConfig,
} from '../src/config/loader.js';

describe('config loader', () => {
  let tempDir: string;
  let nested: string; // tempDir/l1/l2/l3/l4/l5

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'thanos-config-test-'));
    nested = path.join(tempDir, 'l1', 'l2', 'l3', 'l4', 'l5');
    await fs.mkdir(nested, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('findConfigFile', () => {
    it('対象ディレクトリのファイルを返す', async () => {
      await fs.writeFile(path.join(nested, '.thanosignore'), '*.log\n');
      expect(await findConfigFile(nested, '.thanosignore')).toBe(path.join(nested, '.thanosignore'));
    });

    it('親ディレクトリまで探索する', async () => {
      const l2 = path.join(tempDir, 'l1', 'l2');
      await fs.writeFile(path.join(l2, '.thanosignore'), '*.log\n');
      expect(await findConfigFile(nested, '.thanosignore')).toBe(path.join(l2, '.thanosignore'));
    });

    it('近い階層のファイルが優先される', async () => {
      await fs.writeFile(path.join(tempDir, 'l1', '.thanosignore'), 'far\n');
      await fs.writeFile(path.join(tempDir, 'l1', 'l2', 'l3', '.thanosignore'), 'near\n');
      expect(await findConfigFile(nested, '.thanosignore')).toBe(
        path.join(tempDir, 'l1', 'l2', 'l3', '.thanosignore')
      );
    });

    it(`${MAX_SEARCH_LEVELS}階層を超えては探索しない`, async () => {
      // nested から数えて 6 階層目（tempDir）
      await fs.writeFile(path.join(tempDir, '.thanosignore'), '*.log\n');
      expect(await findConfigFile(nested, '.thanosignore')).toBeUndefined();
      // 5 階層目（l1）は探索範囲内
      await fs.writeFile(path.join(tempDir, 'l1', '.thanosignore'), '*.log\n');
      expect(await findConfigFile(nested, '.thanosignore')).toBe(
        path.join(tempDir, 'l1', '.thanosignore')
      );
    });

    it('同一階層では指定順に優先', async () => {
      await fs.writeFile(path.join(nested, '.thanosrc.yaml'), 'weights: {}\n');
      await fs.writeFile(path.join(nested, '.thanosrc.json'), '{}');
      expect(await findConfigFile(nested, ['.thanosrc.json', '.thanosrc.yaml'])).toBe(
        path.join(nested, '.thanosrc.json')
      );
    });

    it('同名のディレクトリはファイルとして扱わない', async () => {
      await fs.mkdir(path.join(nested, '.thanosignore'));
      await fs.writeFile(path.join(tempDir, 'l1', 'l2', 'l3', 'l4', '.thanosignore'), 'x\n');
      expect(await findConfigFile(nested, '.thanosignore')).toBe(
        path.join(tempDir, 'l1', 'l2', 'l3', 'l4', '.thanosignore')
      );
    });
  });

  describe('loadProtectionPatterns', () => {
    it('ignoreファイルのパターンを読み込む', async () => {
      await fs.writeFile(path.join(nested, '.thanosignore'), '# comment\n*.log\n\nimportant/\n*.log\n');
      const result = await loadProtectionPatterns(nested);
      expect(E.isRight(result)).toBe(true);
      if (E.isRight(result)) {
        expect([...result.right.patterns]).toEqual(['*.log', 'important/']);
        expect(result.right.source).toBe(path.join(nested, '.thanosignore'));
        expect(result.right.usingDefaults).toBe(false);
      }
    });

    it('ignoreファイルがなければデフォルトパターン', async () => {
      const result = await loadProtectionPatterns(nested);
      expect(E.isRight(result)).toBe(true);
      if (E.isRight(result)) {
        expect(result.right.patterns).toEqual(new Set(DEFAULT_PROTECTED_PATTERNS));
        expect(result.right.source).toBeUndefined();
        expect(result.right.usingDefaults).toBe(true);
      }
    });

    it('コメントのみのignoreファイルはデフォルトパターン', async () => {
      await fs.writeFile(path.join(nested, '.thanosignore'), '# nothing here\n\n');
      const result = await loadProtectionPatterns(nested);
      expect(E.isRight(result)).toBe(true);
      if (E.isRight(result)) {
        expect(result.right.patterns).toEqual(new Set(DEFAULT_PROTECTED_PATTERNS));
        expect(result.right.usingDefaults).toBe(true);
      }
    });
  });

  describe('loadWeightConfig', () => {
    it('設定ファイルがなければ空の設定', async () => {
      expect(await loadWeightConfig(nested)).toEqual(E.right({ weights: {} }));
    });

    it('JSONの重み設定を読み込む', async () => {
      const rcPath = path.join(nested, '.thanosrc.json');
      await fs.writeFile(rcPath, JSON.stringify({ weights: { by_extension: { '.log': 0.9 } } }));
      expect(await loadWeightConfig(nested)).toEqual(
        E.right({ weights: { by_extension: { '.log': 0.9 } }, source: rcPath })
      );
    });

    it('YAMLの重み設定を読み込む', async () => {
      const rcPath = path.join(tempDir, 'l1', '.thanosrc.yml');
      await fs.writeFile(rcPath, 'weights:\n  by_age_days:\n    "30+": 0.9\n');
      expect(await loadWeightConfig(nested)).toEqual(
        E.right({ weights: { by_age_days: { '30+': 0.9 } }, source: rcPath })
      );
    });

    it('weightsキーがなければ空の設定', async () => {
      const rcPath = path.join(nested, '.thanosrc.json');
      await fs.writeFile(rcPath, '{"theme": "purple"}');
      expect(await loadWeightConfig(nested)).toEqual(E.right({ weights: {}, source: rcPath }));
    });

    it('範囲外の重みはCONFIG_INVALID', async () => {
      const rcPath = path.join(nested, '.thanosrc.json');
      await fs.writeFile(rcPath, JSON.stringify({ weights: { by_size_mb: { '10+': 2 } } }));
      const result = await loadWeightConfig(nested);
      expect(E.isLeft(result)).toBe(true);
      if (E.isLeft(result)) {
        expect(result.left.code).toBe('CONFIG_INVALID');
        expect(result.left.message).toBe(
          `Invalid config file ${rcPath}: weights.by_size_mb.10+: weight must be <= 1`
        );
      }
    });

    it('壊れたJSONはCONFIG_INVALID', async () => {
      await fs.writeFile(path.join(nested, '.thanosrc.json'), '{ "weights": ');
      const result = await loadWeightConfig(nested);
      expect(E.isLeft(result)).toBe(true);
      if (E.isLeft(result)) {
        expect(result.left.code).toBe('CONFIG_INVALID');
        expect(result.left.message).toContain('JSON parse error');
      }
    });
  });
});
