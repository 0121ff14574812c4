import { z } from 'zod';

/**
 * 成績管理のエラー設計
 *
 * 例外は投げず、判別共用体の値として各層を流す。
 * どのエラーも現在の操作を終わらせるだけで、メニューは継続する。
 */

// === 基底エラースキーマ ===
export const GradeBookErrorBaseSchema = z.object({
  type: z.string(),
  message: z.string(),
  code: z.string(),
  timestamp: z.date()
});

// === 検証エラー（成績・単位数・対話入力） ===
export const ValidationErrorSchema = GradeBookErrorBaseSchema.extend({
  type: z.literal('ValidationError'),
  field: z.string().optional(),
  value: z.unknown().optional()
});

// === 保存データが存在しない（エラーではなく通知扱い） ===
export const DataNotFoundErrorSchema = GradeBookErrorBaseSchema.extend({
  type: z.literal('DataNotFoundError'),
  path: z.string()
});

// === 保存データの破損 ===
export const CorruptDataErrorSchema = GradeBookErrorBaseSchema.extend({
  type: z.literal('CorruptDataError'),
  path: z.string(),
  line: z.number().int().optional()
});

// === ファイル入出力の失敗 ===
export const PersistenceErrorSchema = GradeBookErrorBaseSchema.extend({
  type: z.literal('PersistenceError'),
  path: z.string(),
  operation: z.enum(['read', 'write'])
});

// === 対話入力の終端 ===
export const InputClosedErrorSchema = GradeBookErrorBaseSchema.extend({
  type: z.literal('InputClosedError')
});

export const GradeBookErrorSchema = z.discriminatedUnion('type', [
  ValidationErrorSchema,
  DataNotFoundErrorSchema,
  CorruptDataErrorSchema,
  PersistenceErrorSchema,
  InputClosedErrorSchema
]);

export type ValidationError = z.infer<typeof ValidationErrorSchema>;
export type DataNotFoundError = z.infer<typeof DataNotFoundErrorSchema>;
export type CorruptDataError = z.infer<typeof CorruptDataErrorSchema>;
export type PersistenceError = z.infer<typeof PersistenceErrorSchema>;
export type InputClosedError = z.infer<typeof InputClosedErrorSchema>;
export type GradeBookError = z.infer<typeof GradeBookErrorSchema>;

/** ファイルからの読み込みで起こりうるエラー */
export type LoadError = DataNotFoundError | CorruptDataError | PersistenceError;

// === エラーファクトリ関数 ===
export const createValidationError = (
  message: string,
  code: string = 'VALIDATION_FAILED',
  field?: string,
  value?: unknown
): ValidationError => ({
  type: 'ValidationError',
  message,
  code,
  timestamp: new Date(),
  field,
  value
});

export const createInvalidGradeError = (value: unknown): ValidationError =>
  createValidationError(`Invalid grade: ${String(value)}`, 'INVALID_GRADE', 'grade', value);

export const createInvalidCreditError = (value: unknown): ValidationError =>
  createValidationError(`Invalid credit hours: ${String(value)}`, 'INVALID_CREDIT', 'credit', value);

export const createDataNotFoundError = (path: string): DataNotFoundError => ({
  type: 'DataNotFoundError',
  message: 'No saved data found.',
  code: 'DATA_NOT_FOUND',
  path,
  timestamp: new Date()
});

export const createCorruptDataError = (
  path: string,
  detail: string,
  line?: number
): CorruptDataError => ({
  type: 'CorruptDataError',
  message: line === undefined
    ? `Corrupt data in file: ${detail}`
    : `Corrupt data in file at line ${line}: ${detail}`,
  code: 'CORRUPT_DATA',
  path,
  line,
  timestamp: new Date()
});

export const createPersistenceError = (
  path: string,
  operation: 'read' | 'write',
  cause: Error
): PersistenceError => ({
  type: 'PersistenceError',
  message: operation === 'write'
    ? `Failed to open file for saving: ${cause.message}`
    : `Failed to read file: ${cause.message}`,
  code: 'IO_ERROR',
  path,
  operation,
  timestamp: new Date()
});

export const createInputClosedError = (): InputClosedError => ({
  type: 'InputClosedError',
  message: 'Input stream closed',
  code: 'INPUT_CLOSED',
  timestamp: new Date()
});

// === エラー分析ヘルパー ===
export const isValidationError = (error: GradeBookError): error is ValidationError =>
  error.type === 'ValidationError';

export const isDataNotFoundError = (error: GradeBookError): error is DataNotFoundError =>
  error.type === 'DataNotFoundError';

export const isCorruptDataError = (error: GradeBookError): error is CorruptDataError =>
  error.type === 'CorruptDataError';

