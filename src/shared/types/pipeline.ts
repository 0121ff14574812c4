import { type Result, map, flatMap, mapError } from './result.js';

/**
 * Result型専用パイプライン - エラーが発生すると途中で停止
 */
export interface ResultPipe<T, E> {
  map<U>(fn: (data: T) => U): ResultPipe<U, E>;
  flatMap<U>(fn: (data: T) => Result<U, E>): ResultPipe<U, E>;
  mapError<F>(fn: (error: E) => F): ResultPipe<T, F>;
  filter(predicate: (data: T) => boolean, errorOnFalse: (data: T) => E): ResultPipe<T, E>;
  value(): Result<T, E>;
}

export function resultPipe<T, E>(initial: Result<T, E>): ResultPipe<T, E> {
  return {
    map<U>(fn: (data: T) => U) {
      return resultPipe(map(initial, fn));
    },
    flatMap<U>(fn: (data: T) => Result<U, E>) {
      return resultPipe(flatMap(initial, fn));
    },
    mapError<F>(fn: (error: E) => F) {
      return resultPipe(mapError(initial, fn));
    },
    filter(predicate: (data: T) => boolean, errorOnFalse: (data: T) => E) {
      const filtered: Result<T, E> = !initial.success || predicate(initial.data)
        ? initial
        : { success: false, error: errorOnFalse(initial.data) };
      return resultPipe(filtered);
    },
    value(): Result<T, E> {
      return initial;
    }
  };
}
