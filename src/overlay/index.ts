// src/overlay/index.ts

export * from './types';
export { OverlaySpecBuilder } from './spec_builder';
export type { OverlaySpecInit } from './spec_builder';
export { writeDocument } from './document_writer';
export type { ElementScope } from './document_writer';
export { ManifestGenerator, needsSamsungPermission, needsTargetSdk } from './manifest';
export { CompileStage, artifactPaths } from './compile_stage';
export type { CompileStageOptions } from './compile_stage';
export { PostProcessStage, ToolApkSigner, discardIntermediates } from './post_process';
export type { PostProcessStageOptions, ApkSigner, SigningKey } from './post_process';
export { OverlayPipeline, defaultPlatformProfile } from './pipeline';
export type { OverlayPipelineOptions, OverlayToolPaths } from './pipeline';
