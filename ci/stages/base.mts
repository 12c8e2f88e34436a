import { BuildError, BuildErrorCode } from "../errors.mjs";
import { stage, type Stage } from "../stage.mjs";

// [registry[:port]/]path[:tag][@sha256:digest]
const IMAGE_REFERENCE =
	/^(?:[a-z0-9.-]+(?::\d+)?\/)?[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*(?::[\w][\w.-]{0,127})?(?:@sha256:[a-f0-9]{64})?$/;

export const isImageReference = (image: string): boolean =>
	IMAGE_REFERENCE.test(image);

export const baseStage = (image: string): Stage => {
	if (!isImageReference(image)) {
		throw new BuildError(
			BuildErrorCode.INVALID_BASE_IMAGE,
			"base",
			`"${image}" is not a valid image reference`
		);
	}

	return stage("base", "Use python base image", [{ kind: "from", image }]);
};
