// lists the images of a labeling job, env JOB_ID
import { Api, runMain } from '../src';
import { envId } from './envId';

void runMain('GET_LABELING_JOB_IMAGES', async () => {
  const api = Api.fromEnv();
  const info = await api.labelingJob.getInfoByIdStrict(envId('JOB_ID'));
  for (const entity of info.entities) {
    console.info(`${entity.id}\t${entity.name}\t${entity.reviewStatus}`);
  }
});
