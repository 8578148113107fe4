export * from './env';
export { AnalysisPipeline, createPipeline, toCoreLogger, type PipelineDependencies } from './pipeline';
