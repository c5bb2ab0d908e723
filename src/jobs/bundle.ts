import { existsSync, readFileSync, statSync } from 'node:fs';
import { basename, dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import JSZip from 'jszip';
import { RESULT_END_MARKER, RESULT_START_MARKER } from '../protocol/result-markers.js';

const PROJECT_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');
const TEMPLATE_DIR = resolve(PROJECT_ROOT, 'templates', 'remote-job');

export type JobBundleInput = {
  code: string;
  history: string[];
  packages: string[];
  resourceRefs: string[];
};

export type JobBundle = {
  bytes: Buffer;
  files: string[];
  skippedResources: string[];
};

function readTemplate(name: string): string {
  const filePath = resolve(TEMPLATE_DIR, name);
  if (!existsSync(filePath)) {
    throw new Error(`Missing template file: ${filePath}`);
  }
  return readFileSync(filePath, 'utf8');
}

// Single pass, so placeholder-looking text inside substituted values is never expanded.
function fill(template: string, values: Record<string, string>): string {
  return template.replace(/__[A-Z_]+_JSON__/g, (token) => values[token] ?? token);
}

/**
 * Splits `name@range` into its parts; scoped names keep their leading `@`.
 */
export function splitPackageSpec(spec: string): { name: string; range: string } {
  const at = spec.indexOf('@', spec.startsWith('@') ? 1 : 0);
  if (at <= 0) {
    return { name: spec, range: 'latest' };
  }
  return { name: spec.slice(0, at), range: spec.slice(at + 1) || 'latest' };
}

export function renderPackageManifest(packages: string[]): string {
  const dependencies: Record<string, string> = {};
  for (const spec of packages) {
    const { name, range } = splitPackageSpec(spec);
    dependencies[name] = range;
  }
  return JSON.stringify({ name: 'stepflow-job', private: true, type: 'module', dependencies }, null, 2);
}

export function renderEntryProgram(input: Pick<JobBundleInput, 'code' | 'history'>, resourceNames: string[]): string {
  return fill(readTemplate('main.mjs'), {
    __HISTORY_JSON__: JSON.stringify(input.history),
    __CODE_JSON__: JSON.stringify(input.code),
    __RESOURCES_JSON__: JSON.stringify(resourceNames),
    __START_MARKER_JSON__: JSON.stringify(RESULT_START_MARKER),
    __END_MARKER_JSON__: JSON.stringify(RESULT_END_MARKER)
  });
}

/**
 * Zips everything a remote job needs: Dockerfile, package manifest, the entry program with the
 * session history and new code embedded, and the attached resource files at the bundle root.
 */
export async function buildJobBundle(input: JobBundleInput): Promise<JobBundle> {
  const zip = new JSZip();
  const skippedResources: string[] = [];
  const resourceNames: string[] = [];

  for (const ref of input.resourceRefs) {
    if (!existsSync(ref) || !statSync(ref).isFile()) {
      console.warn(`[remote-job] resource not found, skipping: ${ref}`);
      skippedResources.push(ref);
      continue;
    }
    const name = basename(ref);
    zip.file(name, readFileSync(ref));
    resourceNames.push(name);
  }

  zip.file('Dockerfile', readTemplate('Dockerfile'));
  zip.file('package.json', renderPackageManifest(input.packages));
  zip.file('main.mjs', renderEntryProgram(input, resourceNames));

  const bytes = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  const files = Object.keys(zip.files).sort();
  return { bytes, files, skippedResources };
}
