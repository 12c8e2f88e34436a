export enum BuildErrorCode {
	// configuration
	INVALID_CONFIG = "invalid_config",

	// resolution
	INVALID_BASE_IMAGE = "invalid_base_image",
	INVALID_PACKAGE_NAME = "invalid_package_name",

	// manifest
	MANIFEST_NOT_FOUND = "manifest_not_found",
	MANIFEST_MALFORMED = "manifest_malformed",

	// dependency
	DEPENDENCY_MISMATCH = "dependency_mismatch",
	STAGE_FAILED = "stage_failed",
	VERIFICATION_FAILED = "verification_failed",

	// launch
	INVALID_LAUNCH_CONFIG = "invalid_launch_config",
}

export type StageName =
	| "config"
	| "base"
	| "system-packages"
	| "dependencies"
	| "launcher"
	| "verify";

/**
 * Fatal pipeline failure. Nothing catches these short of the entrypoint,
 * which prints them and exits non-zero.
 */
export class BuildError extends Error {
	readonly code: BuildErrorCode;
	readonly stage: StageName;

	constructor(
		code: BuildErrorCode,
		stage: StageName,
		message: string,
		options?: { cause?: unknown }
	) {
		super(message, options);
		this.name = "BuildError";
		this.code = code;
		this.stage = stage;
	}

	override toString(): string {
		return `[${this.stage}] ${this.code}: ${this.message}`;
	}
}

export const isBuildError = (error: unknown): error is BuildError =>
	error instanceof BuildError;
