/**
 * Shared Types - 統合エクスポート
 *
 * - Result型とその操作
 * - パイプライン処理
 */

export {
  type Result,
  Ok,
  Err,
  map,
  flatMap,
  mapError,
  parseWith,
  fromAsync
} from './result.js';

export {
  type ResultPipe,
  resultPipe
} from './pipeline.js';
