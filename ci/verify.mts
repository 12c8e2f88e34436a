import type { ImageContainer } from "./container.mjs";
import { BuildError, BuildErrorCode } from "./errors.mjs";
import { normalizeName, type Requirement } from "./manifest.mjs";
import { satisfiesPin } from "./version.mjs";
import { APT_ARCHIVES, APT_LISTS } from "./stages/system-packages.mjs";

export type InstalledPackage = {
	readonly name: string;
	readonly version: string;
};

export type VerifyReport = {
	readonly systemPackages: readonly InstalledPackage[];
	readonly pythonPackages: readonly InstalledPackage[];
};

const run = async <F,>(
	container: ImageContainer<F>,
	args: string[]
): Promise<string> => {
	try {
		return await container.withExec(args).stdout();
	} catch (error) {
		throw new BuildError(
			BuildErrorCode.VERIFICATION_FAILED,
			"verify",
			`${args.join(" ")} failed: ${
				error instanceof Error ? error.message : String(error)
			}`,
			{ cause: error }
		);
	}
};

const lines = (output: string): string[] =>
	output
		.split("\n")
		.map((line) => line.trim())
		.filter((line) => line.length > 0);

export const parseDpkgQuery = (output: string): InstalledPackage[] =>
	lines(output).map((line) => {
		const [name, version = ""] = line.split(/\s+/);
		return { name, version };
	});

export const parseFreeze = (output: string): InstalledPackage[] =>
	lines(output).flatMap((line) => {
		const match = /^([^=\s]+)==(\S+)$/.exec(line);
		return match ? [{ name: match[1], version: match[2] }] : [];
	});

export const findPinMismatches = (
	requirements: readonly Requirement[],
	installed: readonly InstalledPackage[]
): string[] => {
	const versions = new Map(
		installed.map((pkg) => [normalizeName(pkg.name), pkg.version])
	);

	return requirements.flatMap((requirement) => {
		if (requirement.pinned === null) return [];
		const version = versions.get(requirement.key);
		if (version !== undefined && satisfiesPin(requirement.pinned, version)) {
			return [];
		}
		return [
			`${requirement.name}: expected ${requirement.pinned}, found ${
				version ?? "nothing"
			}`,
		];
	});
};

/**
 * Checks the built image against what the plan promised: the system packages
 * are present, the apt caches are gone and every `==` pin resolved exactly.
 */
export const verifyImage = async <F,>(
	container: ImageContainer<F>,
	systemPackages: readonly string[],
	requirements: readonly Requirement[]
): Promise<VerifyReport> => {
	const names = systemPackages.map((name) => name.split("=")[0]);
	const installed = parseDpkgQuery(
		await run(container, [
			"dpkg-query",
			"-W",
			"-f=${Package} ${Version}\\n",
			...names,
		])
	);
	const missing = names.filter(
		(name) => !installed.some((pkg) => pkg.name === name)
	);
	if (missing.length > 0) {
		throw new BuildError(
			BuildErrorCode.VERIFICATION_FAILED,
			"verify",
			`System package(s) not installed: ${missing.join(", ")}`
		);
	}

	const leftovers = lines(
		await run(container, [
			"sh",
			"-c",
			`find ${APT_LISTS} -mindepth 1; find ${APT_ARCHIVES} -name '*.deb'`,
		])
	);
	if (leftovers.length > 0) {
		throw new BuildError(
			BuildErrorCode.VERIFICATION_FAILED,
			"verify",
			`Package manager caches were not purged: ${leftovers.join(", ")}`
		);
	}

	// --all keeps pip, setuptools and wheel in the listing
	const pythonPackages = parseFreeze(
		await run(container, ["pip", "freeze", "--all"])
	);
	const mismatches = findPinMismatches(requirements, pythonPackages);
	if (mismatches.length > 0) {
		throw new BuildError(
			BuildErrorCode.DEPENDENCY_MISMATCH,
			"verify",
			`Pinned dependencies did not resolve: ${mismatches.join("; ")}`
		);
	}

	return { systemPackages: installed, pythonPackages };
};
