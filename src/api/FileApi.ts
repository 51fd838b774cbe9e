import { ModuleApi } from './ModuleApi';
import { FileInfo } from './types';

/**
 * Team file storage.
 */
export class FileApi extends ModuleApi<FileInfo> {
  protected readonly infoMethod = 'file-storage.info';

  /**
   * Link that opens a team file in the platform UI.
   *
   * @param fileId id of the file
   *
   * @returns {string}
   */
  public getUrl(fileId: number): string {
    return `${this.api.serverAddress}/files/${fileId}`;
  }
}
