import { z } from 'zod';

/**
 * 成績管理アプリケーション設定定義
 *
 * 設計思想:
 * - 型安全性: Zodによる実行時検証
 * - 環境別設定: 開発・テスト・本番での違い
 * - デフォルト値: 引数なしで元の対話動作を再現する
 */

// === 保存先設定 ===
export const StorageConfigSchema = z.object({
  /** 成績データの保存ファイル */
  dataFilePath: z.string().min(1).default('cgpa_data.txt')
});

// === 対話入力の範囲設定 ===
export const InputConfigSchema = z.object({
  /** 1学期あたりに入力できる科目数の上限 */
  maxCoursesPerSemester: z.number().int().min(1).max(1000).default(100),

  /** 入力可能な単位数の範囲（0より大きいこと） */
  minCredit: z.number().positive().default(0.01),
  maxCredit: z.number().positive().max(1000).default(100)
}).refine(input => input.minCredit <= input.maxCredit, {
  message: 'minCredit must not exceed maxCredit',
  path: ['minCredit']
});

// === 表示設定 ===
export const DisplayConfigSchema = z.object({
  /** GPA・成績表示の小数桁数 */
  precision: z.number().int().min(0).max(6).default(2)
});

// === ログ設定 ===
export const ObservabilityConfigSchema = z.object({
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('warn')
  }).default({})
});

// === 統合設定スキーマ ===
export const GradeBookConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']).default('production'),

  storage: StorageConfigSchema.default({}),
  input: InputConfigSchema.default({}),
  display: DisplayConfigSchema.default({}),
  observability: ObservabilityConfigSchema.default({})
});

// === 型定義 ===
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type DisplayConfig = z.infer<typeof DisplayConfigSchema>;
export type ObservabilityConfig = z.infer<typeof ObservabilityConfigSchema>;
export type GradeBookConfig = z.infer<typeof GradeBookConfigSchema>;
export type LogLevel = ObservabilityConfig['logging']['level'];

/**
 * 部分的な設定（環境変数・プリセット・上書き用）
 */
export type GradeBookConfigOverrides = {
  environment?: GradeBookConfig['environment'];
  storage?: Partial<StorageConfig>;
  input?: Partial<InputConfig>;
  display?: Partial<DisplayConfig>;
  observability?: { logging?: Partial<ObservabilityConfig['logging']> };
};

/**
 * 設定値の検証
 */
export function validateConfig(config: unknown) {
  return GradeBookConfigSchema.safeParse(config);
}

// === 環境別プリセット ===

export const DEVELOPMENT_CONFIG: GradeBookConfigOverrides = {
  observability: { logging: { level: 'info' } }
};

export const TEST_CONFIG: GradeBookConfigOverrides = {
  observability: { logging: { level: 'error' } }
};

export const PRODUCTION_CONFIG: GradeBookConfigOverrides = {
  observability: { logging: { level: 'warn' } }
};
