import { z } from "zod";
import { BuildError, BuildErrorCode } from "./errors.mjs";

export const DEFAULT_BASE_IMAGE = "python:3.13-slim-bullseye";
export const DEFAULT_SYSTEM_PACKAGES = ["curl", "git"] as const;
export const DEFAULT_MANIFEST = "requirements.txt";

export const parsePackageList = (raw: string): string[] => [
	...new Set(raw.split(/[\s,]+/).filter((name) => name.length > 0)),
];

const flag = (fallback: boolean) =>
	z
		.string()
		.default(fallback ? "true" : "false")
		.transform((value) => value.trim().toLowerCase())
		.pipe(z.enum(["true", "false", "1", "0"]))
		.transform((value) => value === "true" || value === "1");

const integer = (fallback: number, min: number, max: number) =>
	z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
	BASE_IMAGE: z.string().trim().min(1).default(DEFAULT_BASE_IMAGE),
	SYSTEM_PACKAGES: z
		.string()
		.default(DEFAULT_SYSTEM_PACKAGES.join(" "))
		.transform(parsePackageList),
	MANIFEST: z.string().trim().min(1).default(DEFAULT_MANIFEST),
	CONTEXT_DIR: z.string().trim().min(1).default("."),
	APT_RETRIES: integer(3, 0, 10),
	APP: z.string().trim().default("main:app"),
	HOST: z.string().trim().min(1).default("0.0.0.0"),
	PORT: integer(8000, 1, 65535),
	WORKERS: integer(4, 1, 512),
	RELOAD: flag(true),
	LAUNCH: flag(false),
	DOCKERFILE_OUT: z.string().trim().min(1).optional(),
	PUBLISH: flag(false),
	IMAGE_NAME: z.string().trim().min(1).default("localhost/asgi-app"),
	VERSION: z.string().trim().min(1).default("latest"),
});

export type LaunchConfig = {
	readonly app: string;
	readonly host: string;
	readonly port: number;
	readonly workers: number;
	readonly reload: boolean;
};

export type BuildConfig = {
	readonly baseImage: string;
	readonly systemPackages: readonly string[];
	readonly manifest: string;
	readonly contextDir: string;
	readonly aptRetries: number;
	readonly launch: LaunchConfig;
	readonly wireLaunch: boolean;
	readonly dockerfileOut: string | null;
	readonly publish: boolean;
	readonly imageName: string;
	readonly version: string;
};

// empty strings count as unset, the way `VERSION=` behaves in a shell
const present = (env: NodeJS.ProcessEnv): Record<string, string> => {
	const vars: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (value) vars[key] = value;
	}

	return vars;
};

export const loadConfig = (
	env: NodeJS.ProcessEnv = process.env
): BuildConfig => {
	const parsed = EnvSchema.safeParse(present(env));
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
			.join("; ");
		throw new BuildError(
			BuildErrorCode.INVALID_CONFIG,
			"config",
			`Invalid configuration (${details})`,
			{ cause: parsed.error }
		);
	}

	const vars = parsed.data;
	return Object.freeze({
		baseImage: vars.BASE_IMAGE,
		systemPackages: Object.freeze(vars.SYSTEM_PACKAGES),
		manifest: vars.MANIFEST,
		contextDir: vars.CONTEXT_DIR,
		aptRetries: vars.APT_RETRIES,
		launch: Object.freeze({
			app: vars.APP,
			host: vars.HOST,
			port: vars.PORT,
			workers: vars.WORKERS,
			reload: vars.RELOAD,
		}),
		wireLaunch: vars.LAUNCH,
		dockerfileOut: vars.DOCKERFILE_OUT ?? null,
		publish: vars.PUBLISH,
		imageName: vars.IMAGE_NAME,
		version: vars.VERSION,
	});
};
