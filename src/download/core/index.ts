/**
 * Core download classes
 */

export { AssetResolver } from "./AssetResolver";
export { checkRuntimeLibrary, DependencyInstaller } from "./DependencyInstaller";
export {
	DownloadEngine,
	type DownloadEngineDependencies,
} from "./DownloadEngine";
export {
	createProgressChannel,
	type ProgressChannel,
	ProgressReceiver,
	ProgressSender,
} from "./ProgressChannel";
export { getContentLength, ProgressSampler } from "./ProgressSampler";
export { requestOrThrow, streamToFile } from "./streamToFile";
