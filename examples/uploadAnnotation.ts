// uploads an annotation to an image, env IMAGE_ID
import path from 'path';
import { Api, loadJsonFile, runMain } from '../src';
import { envId } from './envId';

void runMain('UPLOAD_ANNOTATION', async () => {
  const api = Api.fromEnv();
  const imageId = envId('IMAGE_ID');

  // object ids, class ids and timestamps are assigned by the server
  const annotation = loadJsonFile(path.join(__dirname, 'data', 'annotation.json'));
  await api.annotation.uploadJson(imageId, annotation);
  console.info(`annotation uploaded to image ${imageId}`);
});
