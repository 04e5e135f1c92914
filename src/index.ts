export * from "./@types";
// Settings
export {
	currentEnvironment,
	defaultSettings,
	getSettingsPath,
	type LauncherSettings,
	loadLauncherSettings,
	resolveConfigDir,
	resolveDataDir,
	resolveDefaultGameDir,
	SETTINGS_FILE,
	type SettingsEnvironment,
	type SettingsOptions,
	saveLauncherSettings,
	setupFolderStructure,
} from "./config/LauncherSettings";
export { LauncherEventEmitter } from "./core/EventEmitter";
// Default entry point
export { Launcher, type LauncherDependencies } from "./core/Launcher";
export {
	ProgressMonitor,
	type ProgressMonitorOptions,
} from "./core/ProgressMonitor";
export {
	type LaunchCommand,
	type SpawnFunction,
	VersionRunner,
	type VersionRunnerOptions,
} from "./core/VersionRunner";
export * from "./download";
export * from "./errors";
export * from "./logging";
export { JsonVersionRegistry } from "./registry";
export {
	getExecutableSuffix,
	getPlatformTarget,
	isPosixPlatform,
	mapArch,
	mapPlatform,
} from "./utils/platform";
export { Version } from "./version/Version";
