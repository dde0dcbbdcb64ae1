export type Platform = 'darwin' | 'linux' | 'other';

export type TargetRoot = 'home' | 'config';

export interface MappingDefinition {
  name: string;
  source: string;
  target: string;
  root: TargetRoot;
  description?: string;
}

export interface MappingEntry {
  readonly name: string;
  readonly source: string;
  readonly target: string;
}

export interface Configuration {
  version: string;
  mappings: MappingDefinition[];
}

export interface Settings {
  readonly dotfilesDir: string;
  readonly homeDir: string;
  readonly configRoot: string;
  readonly platform: Platform;
}

export interface Collision {
  target: string;
  names: string[];
}

export type LinkOutcome =
  | { status: 'linked'; name: string; source: string; target: string; replaced: boolean; backup?: string }
  | { status: 'skipped'; name: string; source: string; target: string; reason: string }
  | { status: 'failed'; name: string; source: string; target: string; error: string };

export interface LinkReport {
  outcomes: LinkOutcome[];
  linked: number;
  skipped: number;
  failed: number;
}

export type LinkAction = 'create' | 'replace-symlink' | 'backup-and-link' | 'skip-missing-source';

export interface PlannedLink {
  name: string;
  source: string;
  target: string;
  action: LinkAction;
  backup?: string;
}

export interface LinkStatus {
  name: string;
  source: string;
  target: string;
  sourceExists: boolean;
  status: 'linked' | 'missing' | 'conflict';
  reason?: string;
}
