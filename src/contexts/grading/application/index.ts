export {
  GradeBookService,
  type GradeBookServiceOptions
} from './grade-book-service.js';

export type {
  IGradeBookRepository,
  IConsoleOutput,
  ILineSource
} from './ports.js';
