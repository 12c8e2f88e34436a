import type { StageName } from "./errors.mjs";

export type Step =
	| { readonly kind: "from"; readonly image: string }
	/** Commands chained with `&&` in a single `sh -c` layer. */
	| { readonly kind: "shell"; readonly commands: readonly string[] }
	| {
			readonly kind: "copy";
			readonly source: string;
			readonly destination: string;
	  }
	| { readonly kind: "expose"; readonly port: number }
	| { readonly kind: "cmd"; readonly args: readonly string[] }
	| { readonly kind: "comment"; readonly text: string };

export type Stage = {
	readonly name: Exclude<StageName, "config" | "verify">;
	readonly description: string;
	readonly steps: readonly Step[];
};

export const stage = (
	name: Stage["name"],
	description: string,
	steps: readonly Step[]
): Stage =>
	Object.freeze({ name, description, steps: Object.freeze([...steps]) });
