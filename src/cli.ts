#!/usr/bin/env node
/**
 * liveiso CLI
 *
 * Commands:
 *   liveiso init    [--out <path>] [--force]
 *   liveiso plan    [--config <path>] [overrides] [--script <path>] [--json]
 *   liveiso build   [--config <path>] [overrides] [--log-dir <dir>] [--json]
 *   liveiso export  --out <path> [--config <path>] [overrides]
 *   liveiso doctor  [--config <path>] [overrides] [--json]
 *
 * Exit codes:
 *   0    success
 *   1    a build command exited non-zero
 *   2    validation error (bad config, unknown architecture, ...)
 *   3    environment failure (log dir/file, shell, missing tools)
 *   4    unexpected bug
 *   130  cancelled
 */

import { Command } from 'commander';
import { chmodSync, existsSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { SUPPORTED_ARCHITECTURES, SUPPORTED_VARIANTS } from './contracts/index.js';
import type { BuildConfig } from './config/index.js';
import { saveConfigFile } from './config/file.js';
import { resolveConfig, type ConfigOverrides } from './config/overrides.js';
import { renderBuildSteps, renderScript } from './render/index.js';
import { IsoBuildRunner, type LineSink } from './builder/index.js';
import { runDoctor } from './doctor/index.js';
import {
  createLogger,
  createErrorEnvelope,
  generateRunId,
  writeRunSummary,
  wrapError,
  exitCodeFor,
  EVENTS_FILE_NAME,
  EXIT_BUILD_FAILED,
  EXIT_DEPENDENCY,
  EXIT_SUCCESS,
  type RunnerErrorEnvelope,
  type StructuredLogger,
} from './runner/index.js';

const DEFAULT_CONFIG_FILE = 'liveiso.config.json';

// ---------------------------------------------------------------------------
// Program setup
// ---------------------------------------------------------------------------

const program = new Command();

program
  .name('liveiso')
  .description('Render and run the command pipeline that builds a Debian sid live ISO')
  .version('0.1.0');

function withConfigOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to a JSON build config')
    .option('--arch <name>', `Target architecture (${SUPPORTED_ARCHITECTURES.join(', ')})`)
    .option('--variant <name>', `debootstrap variant (${SUPPORTED_VARIANTS.join(', ')})`)
    .option('--mirror <url>', 'Debian mirror URL')
    .option('--components <csv>', 'Repository components, comma separated')
    .option('--hostname <name>', 'Hostname of the live system')
    .option('--username <name>', 'Live session username')
    .option('--firmware <csv>', 'Firmware packages, comma separated')
    .option('--packages <csv>', 'Extra packages, comma separated')
    .option('--tasks <csv>', 'tasksel tasks, comma separated')
    .option('--workdir <dir>', 'Working directory for the build')
    .option('--secure-boot', 'Enable UEFI secure boot support')
    .option('--no-secure-boot', 'Disable UEFI secure boot support')
    .option('--simulate', 'Simulate the build without running commands')
    .option('--no-simulate', 'Run the commands for real');
}

// ---------------------------------------------------------------------------
// init: write a starter config
// ---------------------------------------------------------------------------

interface InitOptions extends ConfigOverrides {
  out: string;
  force?: boolean;
}

withConfigOptions(
  program
    .command('init')
    .description('Write a config file with default values (plus any overrides)')
    .option('--out <path>', 'Destination file', DEFAULT_CONFIG_FILE)
    .option('--force', 'Overwrite an existing file', false),
).action((options: InitOptions) => {
  try {
    const destination = resolve(options.out);
    if (existsSync(destination) && !options.force) {
      exitWithEnvelope(
        createErrorEnvelope('VALIDATION_ERROR', `${destination} already exists (use --force to overwrite)`),
      );
    }
    const config = resolveConfig({ ...options, config: undefined });
    saveConfigFile(config, destination);
    console.log(`Config written to ${destination}`);
    process.exit(EXIT_SUCCESS);
  } catch (err) {
    handleCliError(err);
  }
});

// ---------------------------------------------------------------------------
// plan: render without running anything
// ---------------------------------------------------------------------------

interface PlanOptions extends ConfigOverrides {
  script?: string;
  json?: boolean;
}

withConfigOptions(
  program
    .command('plan')
    .description('Show the command sequence a build would run')
    .addHelpText('after', '\nExample:\n  liveiso plan --arch arm64 --packages curl,git --script ./build.sh\n')
    .option('--script <path>', 'Also write the sequence as a shell script')
    .option('--json', 'Emit structured JSON to stdout'),
).action((options: PlanOptions) => {
  try {
    const config = resolveConfig(options);
    const steps = renderBuildSteps(config);

    if (options.script) {
      const scriptPath = resolve(options.script);
      writeFileSync(scriptPath, renderScript(config), 'utf-8');
      chmodSync(scriptPath, 0o755);
    }

    if (options.json) {
      process.stdout.write(JSON.stringify({ config: config.toRecord(), steps }, null, 2) + '\n');
    } else {
      console.log(`\nPlan: ${steps.length} command(s) for ${config.architecture}/${config.variant}`);
      steps.forEach((step, i) => {
        console.log(`  [${i + 1}] ${step.id}: ${step.description}`);
        console.log(`      $ ${step.command}`);
      });
      if (options.script) console.log(`\nScript: ${resolve(options.script)}`);
    }

    process.exit(EXIT_SUCCESS);
  } catch (err) {
    handleCliError(err, options.json);
  }
});

// ---------------------------------------------------------------------------
// build: run (or simulate) the sequence
// ---------------------------------------------------------------------------

interface BuildOptions extends ConfigOverrides {
  logDir?: string;
  json?: boolean;
}

withConfigOptions(
  program
    .command('build')
    .description('Run the build, streaming command output')
    .addHelpText('after', '\nExample:\n  liveiso build --config ./liveiso.config.json --no-simulate\n')
    .option('--log-dir <dir>', 'Log directory (default: <workdir>/logs)')
    .option('--json', 'Emit the run summary as JSON to stdout'),
).action(async (options: BuildOptions) => {
  const startedAt = new Date().toISOString();
  const runId = generateRunId();

  let config: BuildConfig;
  try {
    config = resolveConfig(options);
  } catch (err) {
    handleCliError(err, options.json);
  }

  const logDir = resolve(options.logDir ?? join(config.workdir, 'logs'));
  const mode = config.simulate ? 'simulated' : 'real';
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  let log: StructuredLogger | undefined;
  try {
    log = createLogger({
      module: 'liveiso',
      filePath: join(logDir, EVENTS_FILE_NAME),
      json: options.json,
      runId,
    });
    const runner = new IsoBuildRunner(config, { logDir, logger: log });

    const sink: LineSink = options.json
      ? (line) => process.stderr.write(line + '\n')
      : (line) => console.log(line);

    const result = await runner.run(sink, { signal: controller.signal });
    const exitCode = result.success ? EXIT_SUCCESS : EXIT_BUILD_FAILED;

    const summary = writeRunSummary(logDir, {
      run_id: runId,
      command: 'build',
      started_at: startedAt,
      mode: result.mode,
      success: result.success,
      exit_code: exitCode,
      command_count: result.commands.length,
      log_path: result.logPath,
      ...(result.failure && { failure: result.failure }),
    });

    if (options.json) {
      process.stdout.write(JSON.stringify(summary, null, 2) + '\n');
    } else {
      console.log(result.success ? '\nBuild completed successfully.' : '\nBuild failed. Check logs for details.');
      console.log(`Log: ${result.logPath}`);
    }

    process.exit(exitCode);
  } catch (err) {
    const envelope = wrapError(err);
    log?.error('build.error', envelope.userMessage, { code: envelope.code });
    if (existsSync(logDir)) {
      writeRunSummary(logDir, {
        run_id: runId,
        command: 'build',
        started_at: startedAt,
        mode,
        success: false,
        exit_code: exitCodeFor(envelope.code),
        command_count: 0,
        log_path: join(logDir, 'build.log'),
        error: envelope,
      });
    }
    exitWithEnvelope(envelope, options.json);
  } finally {
    process.off('SIGINT', onSigint);
  }
});

// ---------------------------------------------------------------------------
// export: write the effective config
// ---------------------------------------------------------------------------

interface ExportOptions extends ConfigOverrides {
  out: string;
}

withConfigOptions(
  program
    .command('export')
    .description('Export the effective configuration (file + overrides) as JSON')
    .requiredOption('--out <path>', 'Destination file'),
).action((options: ExportOptions) => {
  try {
    const config = resolveConfig(options);
    const runner = new IsoBuildRunner(config);
    const written = runner.exportConfig(resolve(options.out));
    console.log(`Configuration exported to ${written}`);
    process.exit(EXIT_SUCCESS);
  } catch (err) {
    handleCliError(err);
  }
});

// ---------------------------------------------------------------------------
// doctor: host prerequisites
// ---------------------------------------------------------------------------

interface DoctorCommandOptions extends ConfigOverrides {
  json?: boolean;
}

withConfigOptions(
  program
    .command('doctor')
    .description('Check host prerequisites for the configured build')
    .option('--json', 'Output as JSON'),
).action((options: DoctorCommandOptions) => {
  try {
    const config = resolveConfig(options);
    const report = runDoctor(config);

    if (options.json) {
      process.stdout.write(JSON.stringify(report, null, 2) + '\n');
    } else {
      console.log(`\nDoctor (${config.simulate ? 'simulated' : 'real'} build):`);
      for (const check of report.checks) {
        console.log(`  [${check.status.toUpperCase()}] ${check.name}: ${check.message}`);
        if (check.remediation && check.status !== 'pass') {
          console.log(`         ${check.remediation}`);
        }
      }
    }

    process.exit(report.ok ? EXIT_SUCCESS : EXIT_DEPENDENCY);
  } catch (err) {
    handleCliError(err, options.json);
  }
});

// ---------------------------------------------------------------------------
// Error handling helpers
// ---------------------------------------------------------------------------

function exitWithEnvelope(envelope: RunnerErrorEnvelope, json?: boolean): never {
  if (json) {
    process.stderr.write(JSON.stringify({ error: envelope }, null, 2) + '\n');
  } else {
    console.error(`Error [${envelope.code}]: ${envelope.userMessage}`);
    if (process.env.DEBUG && envelope.cause) {
      console.error(`  cause: ${envelope.cause}`);
    }
  }
  process.exit(exitCodeFor(envelope.code));
}

function handleCliError(err: unknown, json?: boolean): never {
  exitWithEnvelope(wrapError(err), json);
}

await program.parseAsync();
