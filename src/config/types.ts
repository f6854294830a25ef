// Configuration-specific types
import { DeploymentTarget, RolloutSettings, TargetCatalog } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  catalog?: CatalogFile;
}

/** Shape of the catalog file once validated */
export interface CatalogFile {
  displayNameParameter: string;
  accounts: DeploymentTarget[];
  rollout?: Partial<RolloutSettings>;
}

export interface LoadedCatalog {
  catalog: TargetCatalog;
  settings: RolloutSettings;
}

export interface ConfigLoader {
  load(path: string): Promise<LoadedCatalog>;
  loadFromPaths(searchPaths: string[]): Promise<LoadedCatalog>;
}
