/**
 * Matrix Drivers
 *
 * Each driver sends presented frames to one kind of output.
 *
 * To add a new output:
 * 1. Create a new driver class extending BaseMatrixDriver
 * 2. Export it from this file
 * 3. Register it in ServiceContainer
 */

export { BaseMatrixDriver } from "./BaseMatrixDriver";
export { EmulatorMatrixDriver } from "./EmulatorMatrixDriver";
export { TerminalMatrixDriver } from "./TerminalMatrixDriver";

// Re-export interfaces for convenience
export type { IMatrixDriver } from "@core/interfaces/IMatrixDriver";
