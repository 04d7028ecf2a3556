// ---------------------------------------------------------------------------
// Shared job domain types.
//
// Records flow one way: raw flag strings become parameters, parameters form a
// JobParameterSet, which drives the actions and the final request document.
// ---------------------------------------------------------------------------

// -- Parameters --------------------------------------------------------------

/** A POSIX shell variable name (`^[A-Za-z_][A-Za-z0-9_]*$`). */
export type ParameterName = string

/** Name/value parameter exported to every action as an environment variable. */
export type EnvParam = {
  readonly kind: 'env';
  readonly name: ParameterName;
  readonly value?: string;
}

/**
 * A remote or local location split into its hierarchical prefix and last token.
 *
 * | uri                          | path                   | basename   |
 * |------------------------------|------------------------|------------|
 * | gs://bucket/folder/file.txt  | gs://bucket/folder/    | file.txt   |
 * | gs://bucket/folder/          | gs://bucket/folder/    |            |
 * | /tmp/ab.txt                  | /tmp/                  | ab.txt     |
 */
export type UriReference = {
  /** Scheme, host and directory; always ends with `/`. */
  readonly path: string;
  /** File name or file wildcard; empty for a directory reference. */
  readonly basename: string;
  readonly recursive: boolean;
}

export type FileRole = 'input' | 'output'

/**
 * File parameter localized before (input) or delocalized after (output) the
 * user steps. `value`, `mountPath` and `uri` are all absent for a parameter
 * that is declared without a value.
 */
export type FileParam = {
  readonly kind: 'file';
  readonly role: FileRole;
  readonly name: ParameterName;
  /** Value as given by the user. */
  readonly value?: string;
  /** Location relative to the data disk mount point. */
  readonly mountPath?: string;
  readonly uri?: UriReference;
  readonly recursive: boolean;
}

export type JobParam = EnvParam | FileParam

/** Validated, collision-free parameters of one job. */
export type JobParameterSet = {
  readonly envs: readonly EnvParam[];
  readonly inputs: readonly FileParam[];
  readonly recursiveInputs: readonly FileParam[];
  readonly outputs: readonly FileParam[];
  readonly recursiveOutputs: readonly FileParam[];
}

/** Raw flag values for the five parameter classes. */
export type JobParamArgs = {
  envs?: string[];
  inputs?: string[];
  inputsRecursive?: string[];
  outputs?: string[];
  outputsRecursive?: string[];
}

// -- Resources ---------------------------------------------------------------

export type ResourceSpec = {
  readonly project: string;
  readonly region: string;
  readonly machineType: string;
  readonly diskSizeGb: number;
  /** Service account email; the service falls back to the compute account. */
  readonly serviceAccount?: string;
  readonly scopes: readonly string[];
}

export type ResourceOptions = {
  project?: string;
  region?: string;
  machineType?: string;
  diskSizeGb?: number;
  serviceAccount?: string;
  scopes?: string | string[];
}

// -- Actions -----------------------------------------------------------------

export type ActionMount = {
  readonly disk: string;
  readonly path: string;
  readonly readOnly: boolean;
}

/** One pipeline action, already in the execution service's wire shape. */
export type ActionSpec = {
  readonly name: string;
  readonly imageUri: string;
  readonly commands: readonly string[];
  readonly environment: Readonly<Record<string, string>>;
  readonly flags: readonly string[];
  readonly mounts: readonly ActionMount[];
  /** Duration string, e.g. `86400s`. */
  readonly timeout: string;
  readonly entrypoint?: string;
}

/**
 * A user-supplied step, run between localization and delocalization.
 * Exactly one of `commands` (passed as is) or `script` (wrapped in a strict
 * bash prologue) must be given.
 */
export type UserStep = {
  name: string;
  image: string;
  commands?: string[];
  script?: string;
  entrypoint?: string;
  environment?: Record<string, string>;
  flags?: string[];
  timeout?: string;
}

// -- Request document --------------------------------------------------------

export type ServiceAccountSpec = {
  readonly email?: string;
  readonly scopes: readonly string[];
}

export type VirtualMachineSpec = {
  readonly machineType: string;
  readonly preemptible: boolean;
  readonly disks: ReadonlyArray<{readonly name: string; readonly sizeGb: number}>;
  readonly serviceAccount: ServiceAccountSpec;
}

export type RequestResources = {
  readonly projectId: string;
  readonly regions: readonly string[];
  readonly virtualMachine: VirtualMachineSpec;
}

export type RequestDocument = {
  readonly pipeline: {
    readonly actions: readonly ActionSpec[];
    readonly resources: RequestResources;
    readonly environment: Readonly<Record<string, string>>;
    readonly timeout: string;
  };
  readonly labels: Readonly<Record<string, string>>;
}
