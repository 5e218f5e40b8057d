export { Pipeline, PipelineOptions } from './Pipeline';
