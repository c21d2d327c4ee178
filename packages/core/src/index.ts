export * as AcCoverage from "./ac_coverage";
export * as ArtifactValidators from "./artifact_validators";
export * as ConfigLoader from "./config_loader";
export * as Errors from "./errors";
export * as FileLister from "./file_lister";
export * as GraphValidator from "./graph_validator";
export * as Logger from "./logger";
export * as Schemas from "./schemas";
export * as TaskStore from "./task_store";
export * as TransitionRunner from "./transition_runner";
export * as ValidationEngine from "./validation_engine";
export * as WorkflowAssessor from "./workflow_assessor";
export * as WorkflowModel from "./workflow_model";
