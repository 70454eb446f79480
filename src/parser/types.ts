export type Language = 'typescript' | 'python';

export type ModuleId = string;

export interface ModuleRecord {
  id: ModuleId;
  filePath: string;
  relativePath: string;
}

export type ExtractionFailure = 'decode' | 'syntax' | 'missing';

export interface ExtractionWarning {
  moduleId: ModuleId;
  filePath: string;
  reason: ExtractionFailure;
  message: string;
}

export interface ExtractionResult {
  moduleId: ModuleId;
  imports: Set<ModuleId>;
  warning?: ExtractionWarning;
}

export interface ImportMap {
  imports: Map<ModuleId, Set<ModuleId>>;
  warnings: ExtractionWarning[];
}

export interface Declarations {
  classes: string[];
  functions: string[];
}
