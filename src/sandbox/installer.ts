import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import type { ToolOutput } from '../execution/types.js';
import { failed, succeeded } from '../execution/tool-output.js';
import { isValidPackageSpec } from '../execution/shell-command.js';
import { runCommand } from '../lib/run-command.js';

export type PackageInstaller = (packageSpec: string, signal?: AbortSignal) => Promise<ToolOutput>;

function ensureModulesDir(dir: string): void {
  mkdirSync(dir, { recursive: true });
  const manifest = resolve(dir, 'package.json');
  if (!existsSync(manifest)) {
    writeFileSync(manifest, JSON.stringify({ name: 'sandbox-modules', private: true }, null, 2), 'utf8');
  }
}

/**
 * Installs packages into the sandbox's own node_modules with npm, so evaluated code can `require`
 * them. Installation is shared by every session of the server.
 */
export function createNpmInstaller(modulesDir: string, timeoutMs: number): PackageInstaller {
  return async (packageSpec, signal) => {
    if (!isValidPackageSpec(packageSpec)) {
      return failed('rejected', `invalid package spec: ${packageSpec}`);
    }
    ensureModulesDir(modulesDir);
    const result = await runCommand(
      'npm',
      ['install', '--no-audit', '--no-fund', '--prefix', modulesDir, packageSpec],
      { cwd: modulesDir, timeoutMs, signal }
    );
    if (result.spawnError) {
      const kind = result.spawnError.includes('timed out') ? 'timeout' : 'infrastructure';
      return failed(kind, result.spawnError, result.stdout);
    }
    if (result.exitCode !== 0) {
      return failed('execution', `npm install exited with code ${result.exitCode}`, (result.stderr || result.stdout).trim());
    }
    return succeeded(`Successfully installed ${packageSpec}`);
  };
}
