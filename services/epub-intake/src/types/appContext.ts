import type { IntakeConfig } from '../config.js';
import type { IntakeFileSystem } from '../core/fileSystem.js';

export interface AppContext {
  config: IntakeConfig;
  fileSystem: IntakeFileSystem;
  clock: () => Date;
}
