import path from 'path';

export type TaskPaths = {
  dataDir: string;
  taskConfigPath: string;
  resultsDir: string;
};

/**
 * Where the task runner mounts the task's files: `TASK_DATA_DIR`, or
 * `/task_data` when unset.
 */
export function getTaskPaths(env: NodeJS.ProcessEnv = process.env): TaskPaths {
  const dataDir = env.TASK_DATA_DIR !== undefined && env.TASK_DATA_DIR !== '' ? env.TASK_DATA_DIR : '/task_data';
  return {
    dataDir,
    taskConfigPath: path.join(dataDir, 'task_config.json'),
    resultsDir: path.join(dataDir, 'results')
  };
}
