import type { Stage, Step } from "./stage.mjs";

const renderStep = (step: Step): string => {
	switch (step.kind) {
		case "from":
			return `FROM ${step.image}`;
		case "shell":
			return `RUN ${step.commands.join(" \\\n    && ")}`;
		case "copy":
			return `COPY ${step.source} ${step.destination}`;
		case "expose":
			return `EXPOSE ${step.port}`;
		case "cmd":
			return `CMD ${JSON.stringify(step.args)}`;
		case "comment":
			return `#${step.text}`;
	}
};

/**
 * Renders the plan as a Dockerfile, for building the same image with plain
 * `docker build` from the context directory.
 */
export const renderDockerfile = (stages: readonly Stage[]): string =>
	stages
		.map((stage) =>
			[`# ${stage.description}`, ...stage.steps.map(renderStep)].join("\n")
		)
		.join("\n\n") + "\n";
