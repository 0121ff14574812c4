import type { z } from 'zod';
import type {
  GradeBookConfig,
  GradeBookConfigOverrides
} from './grade-book-config.js';
import {
  validateConfig,
  DEVELOPMENT_CONFIG,
  TEST_CONFIG,
  PRODUCTION_CONFIG
} from './grade-book-config.js';
import { DEFAULT_GRADE_BOOK_CONFIG } from './default-config.js';

/**
 * 設定読み込み・管理クラス
 *
 * 優先順位（後ほど強い）:
 * 1. デフォルト設定
 * 2. 環境別プリセット
 * 3. 環境変数
 * 4. 呼び出し側からの上書き
 */

/**
 * 環境変数プレフィックス
 */
const ENV_PREFIX = 'CGPA_';

export type ConfigLoadResult =
  | { success: true; config: GradeBookConfig }
  | { success: false; error: z.ZodError; partialConfig?: unknown };

/**
 * 環境変数から設定を読み込む
 *
 * 値の妥当性はここでは見ない（最後にzodで検証する）
 */
function loadFromEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const environment = env[`${ENV_PREFIX}ENVIRONMENT`];
  if (environment) {
    config.environment = environment;
  }

  const dataFile = env[`${ENV_PREFIX}DATA_FILE`];
  if (dataFile) {
    config.storage = { dataFilePath: dataFile };
  }

  const maxCourses = env[`${ENV_PREFIX}MAX_COURSES`];
  if (maxCourses) {
    config.input = { maxCoursesPerSemester: Number(maxCourses) };
  }

  const logLevel = env[`${ENV_PREFIX}LOG_LEVEL`];
  if (logLevel) {
    config.observability = { logging: { level: logLevel } };
  }

  return config;
}

/**
 * 環境別プリセット設定を取得
 */
function getEnvironmentPreset(environment: unknown): GradeBookConfigOverrides {
  switch (environment) {
    case 'development':
      return DEVELOPMENT_CONFIG;
    case 'test':
      return TEST_CONFIG;
    case 'production':
      return PRODUCTION_CONFIG;
    default:
      return {};
  }
}

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * 深いマージ（オブジェクトの入れ子をマージ）
 */
function deepMerge(target: Record<string, unknown>, source: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }
    const targetValue = result[key];
    result[key] = isPlainObject(sourceValue) && isPlainObject(targetValue)
      ? deepMerge(targetValue, sourceValue)
      : sourceValue;
  }

  return result;
}

/**
 * 設定ローダークラス
 */
export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private cachedConfig: GradeBookConfig | null = null;

  private constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  /**
   * シングルトンインスタンス取得
   */
  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  /**
   * 任意の環境変数集合から読み込むローダー（テスト・埋め込み用）
   */
  static withEnvironment(env: NodeJS.ProcessEnv): ConfigLoader {
    return new ConfigLoader(env);
  }

  /**
   * 設定を読み込み・検証
   */
  load(overrides?: GradeBookConfigOverrides): ConfigLoadResult {
    const envConfig = loadFromEnvironment(this.env);
    const environment: unknown =
      overrides?.environment ?? envConfig.environment ?? DEFAULT_GRADE_BOOK_CONFIG.environment;

    let config = deepMerge({ ...DEFAULT_GRADE_BOOK_CONFIG }, getEnvironmentPreset(environment));
    config = deepMerge(config, envConfig);
    if (overrides) {
      config = deepMerge(config, overrides);
    }

    const validationResult = validateConfig(config);
    if (!validationResult.success) {
      return {
        success: false,
        error: validationResult.error,
        partialConfig: config
      };
    }

    this.cachedConfig = validationResult.data;
    return {
      success: true,
      config: validationResult.data
    };
  }

  /**
   * キャッシュされた設定を取得
   */
  getCached(): GradeBookConfig | null {
    return this.cachedConfig;
  }

  /**
   * キャッシュを直接設定
   */
  setCached(config: GradeBookConfig): void {
    this.cachedConfig = config;
  }
}

/**
 * 現在の設定を取得する便利関数
 *
 * 検証に失敗した場合はデフォルト設定にフォールバックする
 */
export function getCurrentConfig(): GradeBookConfig {
  const loader = ConfigLoader.getInstance();
  const cached = loader.getCached();
  if (cached) {
    return cached;
  }

  const result = loader.load();
  if (result.success) {
    return result.config;
  }

  console.warn('Failed to load configuration, using defaults:', result.error.message);
  loader.setCached(DEFAULT_GRADE_BOOK_CONFIG);
  return DEFAULT_GRADE_BOOK_CONFIG;
}

/**
 * テスト用: 設定を強制的にセット
 */
export function setConfigForTesting(config: GradeBookConfig): void {
  ConfigLoader.getInstance().setCached(config);
}
