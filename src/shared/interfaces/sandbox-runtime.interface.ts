export interface SandboxMount {
  hostPath: string;
  containerPath: string;
  readOnly: boolean;
}

export interface ResourceLimits {
  memoryBytes: number;
  nanoCpus: number;
  pidsLimit: number;
}

/**
 * What to start. Implementations always disable networking and mount the
 * root filesystem read-only; neither is negotiable per sandbox.
 */
export interface SandboxSpec {
  name: string;
  image: string;
  command?: string[];
  mounts: SandboxMount[];
  limits: ResourceLimits;
  scratchBytes: number;
  runtime?: string;
  labels: Record<string, string>;
}

export interface ManagedSandbox {
  id: string;
  name: string;
  createdAt: Date;
}

export interface ISandboxRuntime {
  /** Creates and starts the sandbox, returning its runtime id. */
  start(spec: SandboxSpec): Promise<string>;
  /** Resolves with the exit code once the sandbox stops. */
  wait(id: string): Promise<number>;
  kill(id: string): Promise<void>;
  /** Force-removes the sandbox. Removing an unknown id is not an error. */
  remove(id: string): Promise<void>;
  logs(id: string): Promise<string>;
  /** Sandboxes carrying `label`, including stopped ones. */
  list(label: string): Promise<ManagedSandbox[]>;
}
