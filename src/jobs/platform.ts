export type RemoteApplication = {
  applicationId: string;
  appName: string;
};

export type DeploymentState = 'pending' | 'running' | 'done' | 'error';

export type DeploymentStatus = {
  state: DeploymentState;
  errorMessage: string | null;
};

/**
 * The deployment platform operations a remote job needs. Every call takes the job's abort signal
 * and throws on transport or HTTP failure.
 */
export interface PlatformApi {
  createApplication(name: string, signal: AbortSignal): Promise<RemoteApplication>;
  uploadBundle(applicationId: string, bundle: Buffer, signal: AbortSignal): Promise<void>;
  configureBuild(applicationId: string, signal: AbortSignal): Promise<void>;
  deploy(applicationId: string, signal: AbortSignal): Promise<void>;
  latestDeployment(applicationId: string, signal: AbortSignal): Promise<DeploymentStatus | null>;
  findContainer(appName: string, signal: AbortSignal): Promise<string | null>;
  deleteApplication(applicationId: string, signal: AbortSignal): Promise<void>;
}

export type LogCollectOptions = {
  signal: AbortSignal;
  /** Checked after every received chunk; collection stops once it returns true. */
  isComplete: (collected: string) => boolean;
};

export interface LogTail {
  /**
   * Streams a container's logs and resolves with everything received once `isComplete` holds, the
   * stream closes, or the signal aborts. Rejects only when the stream fails before yielding text.
   */
  collect(containerId: string, options: LogCollectOptions): Promise<string>;
}
