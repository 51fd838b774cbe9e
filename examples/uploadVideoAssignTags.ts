// uploads a video to a new dataset and tags frame ranges of it:
// env PROJECT_ID, VIDEO_PATH
import { Api, getFileNameWithExt, ProjectMeta, runMain, TagCollection, VideoTag } from '../src';
import { envId } from './envId';

void runMain('UPLOAD_VIDEO_ASSIGN_TAGS', async () => {
  const api = Api.fromEnv();
  const projectId = envId('PROJECT_ID');
  const localPath = process.env.VIDEO_PATH ?? '/my_data/car.mp4';

  const project = await api.project.getInfoById(projectId);
  if (project === null) {
    throw new Error(`Project id=${projectId} not found`);
  }
  if (project.type !== 'videos') {
    throw new TypeError('Not a video project');
  }

  const meta = ProjectMeta.fromJson(await api.project.getMeta(project.id));
  const tagMeta = meta.getTagMeta('vehicle_colour');
  if (tagMeta === null) {
    throw new Error('Tag "vehicle_colour" is not defined in the project');
  }

  const dataset = await api.dataset.create(project.id, 'test_dataset', '', true);

  // content already on the server is added by hash, without uploading it again
  const [video] = await api.video.uploadPaths(
    dataset.id,
    [getFileNameWithExt(localPath)],
    [localPath],
    undefined,
    [{ field1: 'value1', field2: 'value2' }]
  );
  console.info(`uploaded video id: ${video.id}`);

  const tags = new TagCollection([
    new VideoTag(tagMeta, 'red', [3, 17]),
    new VideoTag(tagMeta, 'orange', [22, 30])
  ]);
  const tagIds = await api.video.tag.appendToEntity(video.id, project.id, tags);
  console.info(`created tags: ${tagIds.join(', ')}`);
});
