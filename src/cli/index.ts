#!/usr/bin/env node
import { Command, Option } from 'commander';

import { NotFoundError } from '../domain/shared/errors.js';
import { SOURCE_SELECTORS, type SourceSelector } from '../domain/types/packageIndex.js';
import { createServices } from '../services/serviceFactory.js';
import { BULK_LOADER_KINDS, loadConfig, type PkgCacheConfigInput } from '../utils/config.js';
import { createErrorDetails } from '../utils/errorMapping.js';
import { logger } from '../utils/logger.js';

interface GlobalOptions {
  cacheDir?: string;
  release?: string;
  loader?: PkgCacheConfigInput['bulkLoader'];
  timeout?: string;
  key?: string;
  json?: boolean;
  verbose?: boolean;
}

const program = new Command();

program
  .name('pkgcache')
  .description('Cache remote package indexes locally and resolve declared package versions')
  .option('--cache-dir <path>', 'cache directory (default ~/.cache/pkgcache)')
  .option('--release <release>', 'OS release instead of asking nixos-version')
  .addOption(new Option('--loader <kind>', 'bulk loader').choices([...BULK_LOADER_KINDS]))
  .option('--timeout <ms>', 'network timeout in milliseconds')
  .option('--key <name>', 'declaration key to read from configuration files')
  .option('--json', 'print machine-readable output')
  .option('--verbose', 'show debug logs');

const sourceOption = () =>
  new Option('-s, --source <source>', 'index source')
    .choices([...SOURCE_SELECTORS])
    .default('system');

function setup() {
  const options = program.opts<GlobalOptions>();
  if (options.verbose) {
    process.env.LOG_LEVEL = 'debug';
  }
  const config = loadConfig({
    cacheDir: options.cacheDir,
    release: options.release,
    bulkLoader: options.loader,
    requestTimeoutMs: options.timeout === undefined ? undefined : Number(options.timeout),
    declarationKey: options.key,
  });
  return createServices(config);
}

async function run(task: (json: boolean) => Promise<void>): Promise<void> {
  const json = program.opts<GlobalOptions>().json ?? false;
  try {
    await task(json);
    process.exitCode = 0;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.debug({ err }, 'Command failed');
    if (json) {
      console.error(JSON.stringify(createErrorDetails(err)));
    } else {
      console.error('✗', err.message);
    }
    process.exitCode = 1;
  }
}

program
  .command('resolve')
  .description('Resolve the versions of packages declared in configuration files')
  .argument('<files...>', 'configuration files declaring packages')
  .addOption(sourceOption())
  .action(async (files: string[], cmd: { source: SourceSelector }) => {
    await run(async (json) => {
      const services = setup();
      const report = await services.versions.resolveWithReport(cmd.source, files);
      if (json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      const entries = Object.entries(report.versions).sort(([a], [b]) => a.localeCompare(b));
      for (const [attribute, version] of entries) {
        console.log(`${attribute}\t${version}`);
      }
      const dropped = report.dropped.missing + report.dropped.ambiguous;
      if (dropped > 0) {
        console.error(`${dropped} declared package(s) not found in ${report.source} index`);
      }
    });
  });

program
  .command('refresh')
  .description('Rebuild a cache when the remote channel has a new version')
  .addOption(
    new Option('-s, --source <source>', 'index source, or "options" for the options document')
      .choices([...SOURCE_SELECTORS, 'options'])
      .default('system'),
  )
  .action(async (cmd: { source: SourceSelector | 'options' }) => {
    await run(async (json) => {
      const services = setup();
      const result =
        cmd.source === 'options'
          ? await services.maintenance.refreshOptions()
          : await services.maintenance.refresh(cmd.source);
      const telemetry = services.maintenance.getLastTelemetry();
      if (json) {
        console.log(JSON.stringify({ ...result, duration: telemetry?.duration }, null, 2));
        return;
      }
      console.log(
        [
          `${result.rebuilt ? '✓ Rebuilt' : '✓ Up to date'}: ${cmd.source} ${result.version}`,
          `  artifact: ${result.artifactPath}`,
          ...(result.packageCount === undefined ? [] : [`  packages: ${result.packageCount}`]),
          ...(telemetry ? [`  took: ${(telemetry.duration / 1000).toFixed(2)}s`] : []),
        ].join('\n'),
      );
    });
  });

program
  .command('status')
  .description('Show the cached version of a source without network access')
  .addOption(sourceOption())
  .action(async (cmd: { source: SourceSelector }) => {
    await run(async (json) => {
      const services = setup();
      const status = await services.versions.status(cmd.source);
      if (json) {
        console.log(JSON.stringify(status, null, 2));
        return;
      }
      console.log(
        [
          `${cmd.source}: ${status.markerVersion ?? 'never built'}`,
          `  artifact: ${status.artifactPath}${status.artifactExists ? '' : ' (missing)'}`,
          ...(status.refreshing ? ['  refresh in progress'] : []),
        ].join('\n'),
      );
    });
  });

program
  .command('lookup')
  .description('List attributes providing a package name')
  .argument('<pname>', 'package name')
  .addOption(sourceOption())
  .action(async (pname: string, cmd: { source: SourceSelector }) => {
    await run(async (json) => {
      const services = setup();
      const rows = await services.versions.lookupByPname(cmd.source, pname);
      if (json) {
        console.log(JSON.stringify(rows, null, 2));
        return;
      }
      for (const row of rows) {
        console.log(`${row.attribute}\t${row.version ?? ''}`);
      }
    });
  });

program
  .command('meta')
  .description('Show metadata of an attribute from the system index')
  .argument('<attribute>', 'package attribute')
  .action(async (attribute: string) => {
    await run(async (json) => {
      const services = setup();
      const meta = await services.versions.getPackageMeta('system', attribute);
      if (!meta) {
        throw new NotFoundError('Package metadata', attribute);
      }
      if (json) {
        console.log(JSON.stringify(meta, null, 2));
        return;
      }
      const flags = (['broken', 'insecure', 'unsupported', 'unfree'] as const).filter(
        (flag) => meta[flag],
      );
      console.log(
        [
          meta.attribute,
          `  ${meta.description || '(no description)'}`,
          ...(meta.homepage ? [`  homepage: ${meta.homepage}`] : []),
          ...(flags.length > 0 ? [`  flags: ${flags.join(', ')}`] : []),
        ].join('\n'),
      );
    });
  });

void program.parseAsync();
