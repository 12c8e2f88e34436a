import type { ImageContainer, SourceResolver } from "./container.mjs";
import { BuildError, BuildErrorCode, isBuildError } from "./errors.mjs";
import type { Stage, Step } from "./stage.mjs";

const applyStep = <F,>(
	container: ImageContainer<F>,
	step: Step,
	source: SourceResolver<F>
): ImageContainer<F> => {
	switch (step.kind) {
		case "from":
			return container.from(step.image);
		case "shell":
			return container.withExec(["sh", "-c", step.commands.join(" && ")]);
		case "copy":
			return container.withFile(step.destination, source(step.source));
		case "expose":
			return container.withExposedPort(step.port);
		case "cmd":
			return container.withDefaultArgs({ args: [...step.args] });
		case "comment":
			return container;
	}
};

export const applyStage = <F,>(
	container: ImageContainer<F>,
	stage: Stage,
	source: SourceResolver<F>
): ImageContainer<F> =>
	stage.steps.reduce(
		(current, step) => applyStep(current, step, source),
		container.pipeline(stage.name)
	);

/**
 * Applies the stages in order, forcing evaluation after each one so that a
 * failure is attributed to its stage and nothing after it runs.
 */
export const buildImage = async <F,>(
	container: ImageContainer<F>,
	stages: readonly Stage[],
	source: SourceResolver<F>,
	log: (message: string) => void = console.log
): Promise<ImageContainer<F>> => {
	let current = container;
	for (const stage of stages) {
		log(`==> ${stage.name}: ${stage.description}`);
		try {
			current = await applyStage(current, stage, source).sync();
		} catch (error) {
			if (isBuildError(error)) throw error;
			throw new BuildError(
				BuildErrorCode.STAGE_FAILED,
				stage.name,
				`Stage ${stage.name} failed: ${
					error instanceof Error ? error.message : String(error)
				}`,
				{ cause: error }
			);
		}
	}

	return current;
};
