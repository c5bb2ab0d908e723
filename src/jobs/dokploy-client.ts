import { isRecord } from '../lib/json.js';
import type { DeploymentState, DeploymentStatus, PlatformApi, RemoteApplication } from './platform.js';

export type DokployClientOptions = {
  baseUrl: string;
  apiKey: string;
  environmentId: string;
};

const DEPLOYMENT_STATES: readonly DeploymentState[] = ['pending', 'running', 'done', 'error'];

function toDeploymentState(value: unknown): DeploymentState {
  return DEPLOYMENT_STATES.find((state) => state === value) ?? 'pending';
}

/**
 * Dokploy REST and tRPC calls used to run one-shot jobs as throwaway applications.
 */
export class DokployClient implements PlatformApi {
  private readonly baseUrl: string;

  constructor(private readonly options: DokployClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  private headers(json: boolean): Record<string, string> {
    const headers: Record<string, string> = { 'x-api-key': this.options.apiKey, accept: 'application/json' };
    if (json) {
      headers['Content-Type'] = 'application/json';
    }
    return headers;
  }

  private async request(method: 'GET' | 'POST', path: string, body: unknown, signal: AbortSignal): Promise<unknown> {
    const isForm = body instanceof FormData;
    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: this.headers(method === 'POST' && !isForm),
      body: body === undefined ? undefined : isForm ? body : JSON.stringify(body),
      signal
    });

    const text = await response.text();
    let parsed: unknown = {};
    if (text) {
      try {
        parsed = JSON.parse(text);
      } catch {
        parsed = { message: text };
      }
    }

    if (!response.ok) {
      const msg = isRecord(parsed) && typeof parsed.message === 'string'
        ? parsed.message
        : `HTTP ${response.status}`;
      throw new Error(`${method} ${path} failed: ${msg}`);
    }
    return parsed;
  }

  async createApplication(name: string, signal: AbortSignal): Promise<RemoteApplication> {
    const body = await this.request('POST', '/api/application.create', {
      name,
      environmentId: this.options.environmentId
    }, signal);
    if (!isRecord(body) || typeof body.applicationId !== 'string') {
      throw new Error('application.create returned no applicationId');
    }
    return {
      applicationId: body.applicationId,
      appName: typeof body.appName === 'string' ? body.appName : name
    };
  }

  async uploadBundle(applicationId: string, bundle: Buffer, signal: AbortSignal): Promise<void> {
    const form = new FormData();
    form.append('applicationId', applicationId);
    form.append('zip', new Blob([new Uint8Array(bundle)], { type: 'application/zip' }), 'app.zip');
    await this.request('POST', '/api/trpc/application.dropDeployment', form, signal);
  }

  async configureBuild(applicationId: string, signal: AbortSignal): Promise<void> {
    await this.request('POST', '/api/application.saveBuildType', {
      applicationId,
      buildType: 'dockerfile',
      dockerfile: 'Dockerfile',
      dockerContextPath: '',
      dockerBuildStage: ''
    }, signal);
  }

  async deploy(applicationId: string, signal: AbortSignal): Promise<void> {
    await this.request('POST', '/api/application.deploy', { applicationId }, signal);
  }

  async latestDeployment(applicationId: string, signal: AbortSignal): Promise<DeploymentStatus | null> {
    const body = await this.request(
      'GET',
      `/api/deployment.all?applicationId=${encodeURIComponent(applicationId)}`,
      undefined,
      signal
    );
    if (!Array.isArray(body)) {
      throw new Error('deployment.all returned a non-array body');
    }
    const latest: unknown = body[0];
    if (!isRecord(latest)) {
      return null;
    }
    return {
      state: toDeploymentState(latest.status),
      errorMessage: typeof latest.errorMessage === 'string' ? latest.errorMessage : null
    };
  }

  async findContainer(appName: string, signal: AbortSignal): Promise<string | null> {
    const input = encodeURIComponent(JSON.stringify({ json: { appName, serverId: '' } }));
    const body = await this.request('GET', `/api/trpc/docker.getContainersByAppNameMatch?input=${input}`, undefined, signal);
    const result = isRecord(body) ? body.result : null;
    const data = isRecord(result) ? result.data : null;
    const containers = isRecord(data) ? data.json : null;
    if (!Array.isArray(containers)) {
      return null;
    }
    const first: unknown = containers[0];
    return isRecord(first) && typeof first.containerId === 'string' ? first.containerId : null;
  }

  async deleteApplication(applicationId: string, signal: AbortSignal): Promise<void> {
    await this.request('POST', '/api/application.delete', { applicationId }, signal);
  }

  logStreamUrl(containerId: string, tailLines: number): string {
    const wsBase = this.baseUrl.replace(/^http/, 'ws');
    const query = new URLSearchParams({
      containerId,
      tail: String(tailLines),
      since: 'all',
      search: '',
      runType: 'native'
    });
    return `${wsBase}/docker-container-logs?${query.toString()}`;
  }
}
