import { ModuleApi } from './ModuleApi';
import { LabelingJobInfo } from './types';

/**
 * Labeling jobs: a slice of a dataset assigned to annotators. `entities`
 * lists the job's images with their review status.
 */
export class LabelingJobApi extends ModuleApi<LabelingJobInfo> {
  protected readonly infoMethod = 'jobs.info';
}
