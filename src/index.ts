/**
 * liveiso-builder
 *
 * Renders the command sequence that bootstraps a Debian sid root
 * filesystem and builds a hybrid live ISO from it, then runs that
 * sequence (or simulates it) one command at a time.
 */

// Contracts
export {
  SUPPORTED_ARCHITECTURES,
  SUPPORTED_VARIANTS,
  ArchitectureSchema,
  VariantSchema,
  PackageSelectionRecordSchema,
  BuildConfigRecordSchema,
  BuildStepIdSchema,
  ExecutionModeSchema,
  BuildFailureSchema,
  type Architecture,
  type Variant,
  type PackageSelectionRecord,
  type BuildConfigRecord,
  type BuildStepId,
  type ExecutionMode,
  type BuildFailure,
  type BuildResult,
} from './contracts/index.js';

// Configuration
export {
  BuildConfig,
  PackageSelection,
  DEFAULT_BUILD_CONFIG,
  splitCsv,
  type BuildConfigFields,
  type BuildConfigUpdate,
} from './config/index.js';
export { loadConfigFile, saveConfigFile, serializeConfig, safeJsonParse } from './config/file.js';
export { applyOverrides, resolveConfig, type ConfigOverrides } from './config/overrides.js';

// Rendering
export {
  renderBuildSteps,
  renderCommandSequence,
  renderScript,
  shellQuote,
  kernelPackageFor,
  liveImageName,
  TARGET_SUITE,
  OUTPUT_ISO_NAME,
  type BuildStep,
} from './render/index.js';

// Build runner
export {
  IsoBuildRunner,
  RealBackend,
  SimulatedBackend,
  launchShellCommand,
  BUILD_LOG_NAME,
  SIMULATION_HEADER,
  DEFAULT_STEP_DELAY_MS,
  DEFAULT_SHELL,
  type IsoBuildRunnerOptions,
  type RunOptions,
  type ExecutionBackend,
  type LineSink,
  type StepContext,
  type CommandLauncher,
  type LaunchedCommand,
  type LaunchOptions,
  type LaunchOutcome,
} from './builder/index.js';

// Host checks
export {
  runDoctor,
  probeTool,
  hostArchitecture,
  REQUIRED_TOOLS,
  type CheckResult,
  type CheckStatus,
  type DoctorReport,
  type DoctorOptions,
  type HostTool,
  type ToolProbe,
} from './doctor/index.js';

// Runner infrastructure
export * from './runner/index.js';
