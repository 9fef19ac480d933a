/**
 * Core interfaces for the ledboard display
 *
 * These interfaces define the contracts between the render loop, the
 * modules and the outer services so each can be replaced in tests.
 */

export * from "./IFrameBuffer";
export * from "./IMatrixDriver";
export * from "./IDisplayModule";
export * from "./IDisplayOrchestrator";
export * from "./IConfigService";
export * from "./IBrightnessController";
export * from "./IPreviewServer";
