import { BuildError, BuildErrorCode } from "../errors.mjs";
import { stage, type Stage } from "../stage.mjs";

// Debian policy 5.6.1, plus an optional `=version` pin
const PACKAGE_NAME = /^[a-z0-9][a-z0-9+.-]+(?:=[A-Za-z0-9.+~:-]+)?$/;

export const APT_LISTS = "/var/lib/apt/lists";
export const APT_ARCHIVES = "/var/cache/apt/archives";

export const systemPackagesStage = (
	packages: readonly string[],
	retries: number
): Stage => {
	if (packages.length === 0) {
		throw new BuildError(
			BuildErrorCode.INVALID_PACKAGE_NAME,
			"system-packages",
			"No system packages requested"
		);
	}

	const invalid = packages.filter((name) => !PACKAGE_NAME.test(name));
	if (invalid.length > 0) {
		throw new BuildError(
			BuildErrorCode.INVALID_PACKAGE_NAME,
			"system-packages",
			`Invalid package name(s): ${invalid.join(", ")}`
		);
	}

	const acquire = retries > 0 ? ` -o Acquire::Retries=${retries}` : "";
	return stage("system-packages", "Install essentials", [
		{
			kind: "shell",
			commands: [
				`apt-get update${acquire}`,
				`apt-get install -y --no-install-recommends${acquire} ${packages.join(" ")}`,
				"apt-get clean",
				`rm -rf ${APT_LISTS}/*`,
			],
		},
	]);
};
