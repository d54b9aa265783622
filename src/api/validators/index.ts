/**
 * Validators Module
 */

export {
  validateCreateTaskRequest,
  validateTaskIdParams,
  validateListTasksQuery,
} from './task.js';
export type { ListTasksQuery } from './task.js';
