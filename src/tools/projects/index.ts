/**
 * Project Tools Module
 */

export type {
  GetProjectTasksInput,
  CreateProjectInput,
  DeleteProjectInput,
} from './handlers.js';

export {
  handleListProjects,
  handleGetProjectTasks,
  handleCreateProject,
  handleDeleteProject,
} from './handlers.js';
