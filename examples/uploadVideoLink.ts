// downloads a video from a link and uploads it to a videos project:
// env WORKSPACE_ID, VIDEO_URL
import axios from 'axios';
import { createWriteStream } from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { Api, ensureBasePath, getFileNameWithExt, runMain } from '../src';
import { envId } from './envId';

async function downloadFile(url: string, localPath: string): Promise<string> {
  const response = await axios.get<Readable>(url, { responseType: 'stream' });
  await ensureBasePath(localPath);
  await pipeline(response.data, createWriteStream(localPath));
  return localPath;
}

void runMain('UPLOAD_VIDEO_LINK', async () => {
  const url = process.env.VIDEO_URL;
  if (url === undefined) {
    throw new Error('Environment variable VIDEO_URL is not defined');
  }
  const workspaceId = envId('WORKSPACE_ID');
  const localPath = path.join(
    process.env.TASK_DATA_DIR ?? '/task_data',
    getFileNameWithExt(new URL(url).pathname)
  );
  await downloadFile(url, localPath);
  console.info(`downloaded to ${localPath}`);

  const api = Api.fromEnv();
  const project = await api.project.getOrCreate(workspaceId, 'my videos', { type: 'videos' });
  const dataset = await api.dataset.getOrCreate(project.id, 'dataset_xxx');

  const [video] = await api.video.uploadPaths(dataset.id, [getFileNameWithExt(localPath)], [localPath]);
  console.info(`uploaded video ${video.id}: ${video.name}`);
});
