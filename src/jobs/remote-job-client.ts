import { randomUUID } from 'node:crypto';
import type { ExecuteRequest, ExecutionBackend, InstallRequest, ToolErrorKind, ToolOutput } from '../execution/types.js';
import { failed, succeeded } from '../execution/tool-output.js';
import { isValidPackageSpec } from '../execution/shell-command.js';
import { withDeadline, type Deadline } from '../lib/deadline.js';
import { errorMessage } from '../lib/json.js';
import { backoff, sleep } from '../lib/sleep.js';
import { extractResult, hasCompleteResult, stripTimestamps } from '../protocol/result-markers.js';
import type { ExecutionContextStore, Session } from '../sandbox/context-store.js';
import { buildJobBundle } from './bundle.js';
import type { LogTail, PlatformApi } from './platform.js';
import { RemoteJob, type RemoteJobTransition } from './remote-job.js';

export class JobError extends Error {
  constructor(readonly kind: ToolErrorKind, message: string) {
    super(message);
    this.name = 'JobError';
  }
}

export type RemoteJobClientOptions = {
  jobTimeoutMs: number;
  pollMs: number;
  pollRetries: number;
  teardownTimeoutMs: number;
  onTransition?: (transition: RemoteJobTransition) => void;
};

function logTransition(transition: RemoteJobTransition): void {
  console.log(`[remote-job] ${transition.jobId} ${transition.from ?? 'none'} -> ${transition.to}`);
}

/**
 * Runs each code submission as a short-lived application on the deployment platform: allocate,
 * upload the bundle, build and deploy, wait for the deployment, tail the container logs, extract
 * the delimited result and delete the application. Session continuity comes from replaying the
 * session's successful submissions ahead of the new code.
 */
export class RemoteJobClient implements ExecutionBackend {
  readonly name = 'remote';

  constructor(
    private readonly platform: PlatformApi,
    private readonly logs: LogTail,
    private readonly store: ExecutionContextStore,
    private readonly options: RemoteJobClientOptions
  ) {}

  execute(request: ExecuteRequest): Promise<ToolOutput> {
    return this.store.withSession(request.sessionId, (session) => this.run(session, request));
  }

  async installPackage(request: InstallRequest): Promise<ToolOutput> {
    if (!isValidPackageSpec(request.packageSpec)) {
      return failed('rejected', `invalid package spec: ${request.packageSpec}`);
    }
    return this.store.withSession(request.sessionId, (session) => {
      if (!session.packages.includes(request.packageSpec)) {
        session.packages.push(request.packageSpec);
      }
      return succeeded(`Added ${request.packageSpec}; it is installed when the next job is built`);
    });
  }

  resetSession(sessionId: string): Promise<boolean> {
    return this.store.reset(sessionId);
  }

  private async run(session: Session, request: ExecuteRequest): Promise<ToolOutput> {
    const job = new RemoteJob(this.options.onTransition ?? logTransition);
    const deadline = withDeadline(this.options.jobTimeoutMs, request.signal);
    const signal = deadline.signal;

    try {
      const app = await this.stage('allocation', () => this.platform.createApplication(`stepflow-job-${randomUUID()}`, signal));
      job.applicationId = app.applicationId;
      job.appName = app.appName;
      job.transition('created');

      const bundle = await this.stage('bundle', () => buildJobBundle({
        code: request.code,
        history: session.history,
        packages: session.packages,
        resourceRefs: request.resourceRefs
      }));
      job.bundleBytes = bundle.bytes.length;
      await this.stage('upload', () => this.platform.uploadBundle(app.applicationId, bundle.bytes, signal));
      job.transition('uploaded');

      await this.stage('deploy', async () => {
        await this.platform.configureBuild(app.applicationId, signal);
        await this.platform.deploy(app.applicationId, signal);
      });
      job.transition('deploying');

      await this.poll('deployment status', async () => {
        const status = await this.platform.latestDeployment(app.applicationId, signal);
        if (status?.state === 'error') {
          throw new JobError('infrastructure', `deployment failed: ${status.errorMessage ?? 'unknown error'}`);
        }
        return status?.state === 'done' ? true : null;
      }, signal);
      job.transition('running');

      const containerId = await this.poll('container lookup', () => this.platform.findContainer(app.appName, signal), signal);
      const logs = await this.stage('log fetch', () => this.logs.collect(containerId, { signal, isComplete: hasCompleteResult }));
      job.logCursor = logs.length;

      if (signal.aborted && !hasCompleteResult(logs)) {
        const interrupted = this.classify(signal.reason, deadline, request.signal);
        job.settleFailure(interrupted.errorKind === 'timeout' ? 'timed_out' : 'failed');
        return { ...interrupted, output: stripTimestamps(logs).trim() };
      }

      const result = extractResult(logs);
      job.transition(result.success ? 'succeeded' : 'failed');
      if (result.success) {
        session.history.push(request.code);
      }
      return result;
    } catch (error) {
      const output = this.classify(error, deadline, request.signal);
      job.settleFailure(output.errorKind === 'timeout' ? 'timed_out' : 'failed');
      console.error(`[remote-job] ${job.jobId} ${output.errorKind}: ${output.error}`);
      return output;
    } finally {
      deadline.dispose();
      if (job.applicationId) {
        await this.teardown(job.applicationId);
      }
    }
  }

  private classify(error: unknown, deadline: Deadline, external?: AbortSignal): ToolOutput {
    if (deadline.timedOut()) {
      return failed('timeout', `remote job timed out after ${this.options.jobTimeoutMs}ms`);
    }
    if (external?.aborted) {
      return failed('cancelled', 'remote job cancelled');
    }
    if (error instanceof JobError) {
      return failed(error.kind, error.message);
    }
    return failed('infrastructure', errorMessage(error));
  }

  private async stage<T>(label: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof JobError) {
        throw error;
      }
      throw new JobError('infrastructure', `${label} failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Repeats `probe` every pollMs until it yields a value. Thrown errors are retried with backoff up
   * to `pollRetries` consecutive times; a JobError ends polling at once.
   */
  private async poll<T>(label: string, probe: () => Promise<T | null>, signal: AbortSignal): Promise<T> {
    let failures = 0;
    for (;;) {
      signal.throwIfAborted();
      let value: T | null;
      try {
        value = await probe();
        failures = 0;
      } catch (error) {
        if (error instanceof JobError || signal.aborted) {
          throw error;
        }
        failures += 1;
        if (failures > this.options.pollRetries) {
          throw new JobError('infrastructure', `${label} failed after ${failures} attempts: ${errorMessage(error)}`);
        }
        console.warn(`[remote-job] ${label} attempt ${failures} failed, retrying: ${errorMessage(error)}`);
        await sleep(backoff(failures, this.options.pollMs, this.options.pollMs * 8, this.options.pollMs), signal);
        continue;
      }
      if (value !== null) {
        return value;
      }
      await sleep(this.options.pollMs, signal);
    }
  }

  private async teardown(applicationId: string): Promise<void> {
    try {
      await this.platform.deleteApplication(applicationId, AbortSignal.timeout(this.options.teardownTimeoutMs));
    } catch (error) {
      console.error(`[remote-job] teardown of ${applicationId} failed: ${errorMessage(error)}`);
    }
  }
}
