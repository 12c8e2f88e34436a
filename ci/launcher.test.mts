import { describe, expect, it } from "vitest";
import type { LaunchConfig } from "./config.mjs";
import { BuildErrorCode } from "./errors.mjs";
import {
	launchCommand,
	launcherStage,
	launchWarnings,
	validateLaunch,
} from "./launcher.mjs";

const defaults: LaunchConfig = {
	app: "main:app",
	host: "0.0.0.0",
	port: 8000,
	workers: 4,
	reload: true,
};

describe("launchCommand", () => {
	it("binds all interfaces on the configured port and worker count", () => {
		expect(launchCommand(defaults)).toEqual([
			"uvicorn",
			"main:app",
			"--host",
			"0.0.0.0",
			"--port",
			"8000",
			"--workers",
			"4",
			"--reload",
		]);
	});

	it("leaves out --reload when disabled", () => {
		expect(launchCommand({ ...defaults, reload: false }).at(-1)).toBe("4");
	});
});

describe("validateLaunch", () => {
	it("accepts dotted modules and attributes", () => {
		expect(() =>
			validateLaunch({ ...defaults, app: "service.api:create_app" })
		).not.toThrow();
	});

	it("collects every problem in one error", () => {
		expect(() =>
			validateLaunch({ ...defaults, app: "main", port: 0, workers: 0 })
		).toThrow(
			expect.objectContaining({
				code: BuildErrorCode.INVALID_LAUNCH_CONFIG,
				stage: "launcher",
				message:
					'entrypoint "main" is not of the form module:attribute; port 0 is out of range; worker count 0 must be a positive integer',
			})
		);
	});
});

describe("launchWarnings", () => {
	it("flags reload combined with several workers", () => {
		expect(launchWarnings(defaults)).toEqual([
			"--reload is set together with --workers 4; uvicorn will serve with a single worker",
		]);
	});

	it("is quiet for a single reloading worker or several plain workers", () => {
		expect(launchWarnings({ ...defaults, workers: 1 })).toEqual([]);
		expect(launchWarnings({ ...defaults, reload: false })).toEqual([]);
	});
});

describe("launcherStage", () => {
	it("only documents the command by default", () => {
		const stage = launcherStage(defaults, false);
		expect(stage.description).toBe("To run in terminal");
		expect(stage.steps).toEqual([
			{
				kind: "comment",
				text: "uvicorn main:app --host 0.0.0.0 --port 8000 --workers 4 --reload",
			},
		]);
	});

	it("exposes the port and sets the default command when wired", () => {
		const stage = launcherStage({ ...defaults, reload: false }, true);
		expect(stage.steps).toEqual([
			{ kind: "expose", port: 8000 },
			{
				kind: "cmd",
				args: [
					"uvicorn",
					"main:app",
					"--host",
					"0.0.0.0",
					"--port",
					"8000",
					"--workers",
					"4",
				],
			},
		]);
	});
});
