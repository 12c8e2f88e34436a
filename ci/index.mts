import { Client, connect, type File as DaggerFile } from "@dagger.io/dagger";
import { writeFile } from "node:fs/promises";
import path from "node:path";
import { loadConfig } from "./config.mjs";
import { renderDockerfile } from "./dockerfile.mjs";
import { isBuildError } from "./errors.mjs";
import { launchWarnings, validateLaunch } from "./launcher.mjs";
import { readManifest } from "./manifest.mjs";
import { buildImage } from "./pipeline.mjs";
import { planBuild } from "./plan.mjs";
import { verifyImage } from "./verify.mjs";

const main = async () => {
	const config = loadConfig();
	for (const warning of launchWarnings(validateLaunch(config.launch))) {
		console.warn(`warning: ${warning}`);
	}

	// preflight on the host: a missing manifest stops us before the engine starts
	const requirements = await readManifest(
		path.join(config.contextDir, config.manifest)
	);
	console.log(
		`Manifest ${config.manifest}: ${requirements.length} requirement(s)`
	);

	const stages = planBuild(config);
	if (config.dockerfileOut) {
		await writeFile(config.dockerfileOut, renderDockerfile(stages));
		console.log(`Wrote ${config.dockerfileOut}`);
	}

	await connect(
		async (client: Client) => {
			const context = client.host().directory(config.contextDir, {
				include: [config.manifest],
			});

			const image = await buildImage<DaggerFile>(
				client.pipeline("image").container(),
				stages,
				(file) => context.file(file)
			);

			const report = await verifyImage(
				image,
				config.systemPackages,
				requirements
			);
			for (const pkg of report.systemPackages) {
				console.log(`System package ${pkg.name} ${pkg.version}`);
			}
			console.log(
				`Python packages: ${report.pythonPackages
					.map((pkg) => `${pkg.name}==${pkg.version}`)
					.join(", ")}`
			);

			const tags = new Set([config.version, "latest"]);
			if (config.publish) {
				for (const tag of tags) {
					const published = await image.publish(`${config.imageName}:${tag}`);
					console.log(`Published ${published}`);
				}
			} else {
				console.log(`Skipping publish as $PUBLISH is not set to true`);
			}
		},
		{ LogOutput: process.stdout }
	);
};

await main().catch((error: unknown) => {
	console.error(isBuildError(error) ? error.toString() : error);
	process.exitCode = 1;
});
