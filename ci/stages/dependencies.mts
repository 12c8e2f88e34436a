import { posix } from "node:path";
import { stage, type Stage } from "../stage.mjs";

export const dependenciesStage = (manifest: string): Stage => {
	const name = posix.basename(manifest);
	return stage("dependencies", "Update pip & install dependencies", [
		{ kind: "copy", source: manifest, destination: name },
		{
			kind: "shell",
			commands: ["pip install --upgrade pip", `pip install -r ${name}`],
		},
	]);
};
