import type { BuildConfig } from "./config.mjs";
import { baseStage } from "./stages/base.mjs";
import { dependenciesStage } from "./stages/dependencies.mjs";
import { systemPackagesStage } from "./stages/system-packages.mjs";
import { launcherStage } from "./launcher.mjs";
import type { Stage } from "./stage.mjs";

export type { Stage, Step } from "./stage.mjs";

export const planBuild = (config: BuildConfig): readonly Stage[] =>
	Object.freeze([
		baseStage(config.baseImage),
		systemPackagesStage(config.systemPackages, config.aptRetries),
		dependenciesStage(config.manifest),
		launcherStage(config.launch, config.wireLaunch),
	]);
