import type { LaunchConfig } from "./config.mjs";
import { BuildError, BuildErrorCode } from "./errors.mjs";
import { stage, type Stage, type Step } from "./stage.mjs";

// dotted python module, colon, attribute path
const ENTRYPOINT = /^[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*:[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*$/;

export const validateLaunch = (config: LaunchConfig): LaunchConfig => {
	const problems: string[] = [];
	if (!ENTRYPOINT.test(config.app)) {
		problems.push(`entrypoint "${config.app}" is not of the form module:attribute`);
	}
	if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
		problems.push(`port ${config.port} is out of range`);
	}
	if (!Number.isInteger(config.workers) || config.workers < 1) {
		problems.push(`worker count ${config.workers} must be a positive integer`);
	}
	if (config.host.trim().length === 0) {
		problems.push("host must not be empty");
	}

	if (problems.length > 0) {
		throw new BuildError(
			BuildErrorCode.INVALID_LAUNCH_CONFIG,
			"launcher",
			problems.join("; ")
		);
	}

	return config;
};

export const launchCommand = (config: LaunchConfig): string[] => {
	validateLaunch(config);
	const args = [
		"uvicorn",
		config.app,
		"--host",
		config.host,
		"--port",
		String(config.port),
		"--workers",
		String(config.workers),
	];
	if (config.reload) args.push("--reload");
	return args;
};

export const launchWarnings = (config: LaunchConfig): string[] => {
	const warnings: string[] = [];
	if (config.reload && config.workers > 1) {
		// uvicorn runs a single reloading process and ignores --workers
		warnings.push(
			`--reload is set together with --workers ${config.workers}; uvicorn will serve with a single worker`
		);
	}
	return warnings;
};

/**
 * Without `wire` the command is only documented in the image recipe, the way
 * an operator runs it by hand. With it, the port is exposed and the command
 * becomes the image's default.
 */
export const launcherStage = (config: LaunchConfig, wire: boolean): Stage => {
	const args = launchCommand(config);
	const steps: Step[] = wire
		? [
				{ kind: "expose", port: config.port },
				{ kind: "cmd", args },
		  ]
		: [{ kind: "comment", text: args.join(" ") }];

	return stage(
		"launcher",
		wire ? "Start the ASGI server" : "To run in terminal",
		steps
	);
};
