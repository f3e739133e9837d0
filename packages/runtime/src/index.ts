export { assembleServices, createPipelineServices } from "./services.js";
export type { PipelineServices, ServiceParts } from "./services.js";
