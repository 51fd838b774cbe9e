export * from './api/Api';
export * from './api/AnnotationApi';
export * from './api/AppApi';
export * from './api/DatasetApi';
export * from './api/errors';
export * from './api/FileApi';
export * from './api/ImageApi';
export * from './api/ItemApi';
export * from './api/LabelingJobApi';
export * from './api/ModelApi';
export * from './api/ModuleApi';
export * from './api/ProjectApi';
export * from './api/TaskApi';
export * from './api/types';
export * from './api/VideoApi';
export * from './api/WorkspaceApi';
export * from './annotation/ProjectMeta';
export * from './annotation/tags';
export * from './app/widgets';
export * from './imaging/image';
export * from './io/fs';
export * from './io/json';
export * from './nn/benchmark/MetricProvider';
export * from './nn/benchmark/object_detection/baseVisMetric';
export * from './nn/benchmark/object_detection/Recall';
export * from './nn/benchmark/visualization/widgets';
export * from './plugins/importImages';
export * from './plugins/runMain';
export * from './plugins/taskPaths';
export * from './progress';
export * from './utils';
