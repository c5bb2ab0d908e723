import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import JSZip from 'jszip';
import { RESULT_END_MARKER, RESULT_START_MARKER } from '../protocol/result-markers.js';
import { buildJobBundle, renderPackageManifest, splitPackageSpec } from './bundle.js';

test('bundle contains the build files, the entry program and existing resources', async () => {
  const dir = mkdtempSync(join(tmpdir(), 'stepflow-bundle-'));
  const csv = join(dir, 'sales.csv');
  writeFileSync(csv, 'region,amount\nnorth,10\n');

  const bundle = await buildJobBundle({
    code: 'console.log(total);',
    history: ['var total = 5000;'],
    packages: ['simple-statistics@7'],
    resourceRefs: [csv, join(dir, 'missing.xlsx')]
  });

  assert.deepEqual(bundle.files, ['Dockerfile', 'main.mjs', 'package.json', 'sales.csv']);
  assert.deepEqual(bundle.skippedResources, [join(dir, 'missing.xlsx')]);

  const zip = await JSZip.loadAsync(bundle.bytes);
  const main = await zip.file('main.mjs')?.async('string');
  const manifest = await zip.file('package.json')?.async('string');
  const resource = await zip.file('sales.csv')?.async('string');

  assert.ok(main?.includes('const HISTORY = ["var total = 5000;"];'));
  assert.ok(main?.includes('const CODE = "console.log(total);";'));
  assert.ok(main?.includes('const RESOURCES = ["sales.csv"];'));
  assert.ok(main?.includes(`const START_MARKER = "${RESULT_START_MARKER}";`));
  assert.ok(main?.includes(`const END_MARKER = "${RESULT_END_MARKER}";`));
  assert.equal(main?.includes('__CODE_JSON__'), false);
  assert.deepEqual(JSON.parse(manifest ?? '{}').dependencies, { 'simple-statistics': '7' });
  assert.equal(resource, 'region,amount\nnorth,10\n');
});

test('code containing template-like text is embedded literally', async () => {
  const code = 'console.log("$& __HISTORY_JSON__ `${x}`");';
  const bundle = await buildJobBundle({ code, history: [], packages: [], resourceRefs: [] });
  const zip = await JSZip.loadAsync(bundle.bytes);
  const main = await zip.file('main.mjs')?.async('string');

  assert.ok(main?.includes(`const CODE = ${JSON.stringify(code)};`));
});

test('package specs split into name and range', () => {
  assert.deepEqual(splitPackageSpec('lodash'), { name: 'lodash', range: 'latest' });
  assert.deepEqual(splitPackageSpec('lodash@^4.17.0'), { name: 'lodash', range: '^4.17.0' });
  assert.deepEqual(splitPackageSpec('@scope/pkg'), { name: '@scope/pkg', range: 'latest' });
  assert.deepEqual(splitPackageSpec('@scope/pkg@2.1.0'), { name: '@scope/pkg', range: '2.1.0' });
});

test('manifest declares every installed package', () => {
  const manifest = JSON.parse(renderPackageManifest(['a', 'b@1']));
  assert.deepEqual(manifest.dependencies, { a: 'latest', b: '1' });
  assert.equal(manifest.type, 'module');
});
