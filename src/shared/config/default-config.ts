import type { GradeBookConfig } from './grade-book-config.js';

/**
 * デフォルト設定値
 *
 * 環境変数が一つもなくても元の対話動作と同じ値になる
 */
export const DEFAULT_GRADE_BOOK_CONFIG: GradeBookConfig = {
  environment: 'production',

  storage: {
    dataFilePath: 'cgpa_data.txt'
  },

  input: {
    maxCoursesPerSemester: 100,
    minCredit: 0.01,
    maxCredit: 100
  },

  display: {
    precision: 2
  },

  observability: {
    logging: {
      level: 'warn'
    }
  }
};

/**
 * 最小限の設定（テスト用）
 */
export const MINIMAL_CONFIG: GradeBookConfig = {
  ...DEFAULT_GRADE_BOOK_CONFIG,
  environment: 'test',
  storage: { dataFilePath: 'cgpa_test_data.txt' },
  observability: { logging: { level: 'error' } }
};
