import { ModuleApi } from './ModuleApi';
import { WorkspaceInfo } from './types';

export class WorkspaceApi extends ModuleApi<WorkspaceInfo> {
  protected readonly infoMethod = 'workspaces.info';
}
