import type { z } from 'zod';

/**
 * Result型 - 関数型エラーハンドリングの基盤
 *
 * - 例外ではなく値としてエラーを扱う
 * - 成績計算・ファイル入出力・入力検証の全層で共通に使う
 */

export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

// === ファクトリ関数 ===

export const Ok = <T, E = never>(data: T): Result<T, E> => ({
  success: true,
  data
});

export const Err = <E, T = never>(error: E): Result<T, E> => ({
  success: false,
  error
});

// === 基本的なResult型操作 ===

/**
 * 成功値を変換する（Functor）
 */
export const map = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U
): Result<U, E> => {
  return result.success ? Ok(fn(result.data)) : result;
};

/**
 * Result型を返す関数でチェーン（Monad）
 */
export const flatMap = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>
): Result<U, E> => {
  return result.success ? fn(result.data) : result;
};

/**
 * エラーを変換する
 */
export const mapError = <T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F
): Result<T, F> => {
  return result.success ? result : Err(fn(result.error));
};

/**
 * Zodスキーマを使った安全なパース
 */
export const parseWith = <S extends z.ZodTypeAny, E>(
  schema: S,
  data: unknown,
  mapError: (zodError: z.ZodError) => E
): Result<z.output<S>, E> => {
  const parseResult = schema.safeParse(data);
  if (parseResult.success) {
    return Ok(parseResult.data);
  }
  return Err(mapError(parseResult.error));
};

/**
 * 非同期例外を捕捉してResult型に変換
 */
export const fromAsync = async <T>(fn: () => Promise<T>): Promise<Result<T, Error>> => {
  try {
    const data = await fn();
    return Ok(data);
  } catch (error) {
    return Err(error instanceof Error ? error : new Error(String(error)));
  }
};
