/**
 * 設定管理モジュール
 *
 * - 型安全な設定定義
 * - 環境変数からの読み込み
 * - デフォルト値管理
 * - 環境別プリセット
 */

export {
  type GradeBookConfig,
  type GradeBookConfigOverrides,
  type StorageConfig,
  type InputConfig,
  type DisplayConfig,
  type ObservabilityConfig,
  type LogLevel,
  GradeBookConfigSchema,
  StorageConfigSchema,
  InputConfigSchema,
  DisplayConfigSchema,
  ObservabilityConfigSchema,
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './grade-book-config.js';

export {
  DEFAULT_GRADE_BOOK_CONFIG,
  MINIMAL_CONFIG
} from './default-config.js';

export {
  type ConfigLoadResult,
  ConfigLoader,
  getCurrentConfig,
  setConfigForTesting
} from './config-loader.js';
