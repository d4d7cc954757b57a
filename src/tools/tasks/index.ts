/**
 * Task Tools Module
 */

export type {
  GetTaskInput,
  CreateTaskInput,
  UpdateTaskInput,
  CompleteTaskInput,
  SearchTasksInput,
} from './handlers.js';

export {
  handleGetTask,
  handleCreateTask,
  handleUpdateTask,
  handleCompleteTask,
  handleSearchTasks,
} from './handlers.js';
