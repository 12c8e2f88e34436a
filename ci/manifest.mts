import { readFile } from "node:fs/promises";
import { BuildError, BuildErrorCode } from "./errors.mjs";

export type Requirement = {
	readonly name: string;
	/** PEP 503 normalized, for comparing against `pip freeze`. */
	readonly key: string;
	readonly specifier: string;
	readonly pinned: string | null;
	readonly line: number;
};

const REQUIREMENT =
	/^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*(\[[A-Za-z0-9._,\s-]*\])?\s*((?:(?:===|~=|==|!=|<=|>=|<|>)\s*[A-Za-z0-9.*+!_-]+\s*,?\s*)*)(?:;.*)?$/;

export const normalizeName = (name: string): string =>
	name.toLowerCase().replace(/[-_.]+/g, "-");

// option lines, editable installs and direct references are handed to pip as is
const isPassthrough = (line: string): boolean =>
	line.startsWith("-") ||
	/^[a-z+]+:\/\//i.test(line) ||
	/^[A-Za-z0-9][A-Za-z0-9._-]*\s*(?:\[[^\]]*\])?\s*@/.test(line);

type LogicalLine = { readonly text: string; readonly line: number };

// a trailing backslash continues the requirement on the next physical line
const logicalLines = (text: string): LogicalLine[] => {
	const lines: LogicalLine[] = [];
	let pending: LogicalLine | null = null;

	for (const [index, raw] of text.split(/\r?\n/).entries()) {
		const continued = raw.endsWith("\\");
		const part = continued ? raw.slice(0, -1) : raw;
		pending = pending
			? { text: `${pending.text} ${part}`, line: pending.line }
			: { text: part, line: index + 1 };
		if (!continued) {
			lines.push(pending);
			pending = null;
		}
	}
	if (pending) lines.push(pending);

	return lines;
};

export const parseManifest = (text: string): Requirement[] => {
	const requirements: Requirement[] = [];
	const malformed: string[] = [];

	for (const { text: raw, line: number } of logicalLines(text)) {
		const line = raw.replace(/(^|\s)#.*$/, "").trim();
		if (line.length === 0 || isPassthrough(line)) continue;

		// per-requirement options such as --hash belong to pip
		const requirement = line.replace(/\s+--\S.*$/, "");
		const match = REQUIREMENT.exec(requirement);
		if (!match) {
			malformed.push(`line ${number}: ${line}`);
			continue;
		}

		const [, name, , specifier] = match;
		const clauses = specifier.replace(/\s+/g, "").replace(/,$/, "");
		// wildcards and ranges are not exact pins
		const pin = /^===?([^,*]+)$/.exec(clauses);
		requirements.push({
			name,
			key: normalizeName(name),
			specifier: clauses,
			pinned: pin ? pin[1] : null,
			line: number,
		});
	}

	if (malformed.length > 0) {
		throw new BuildError(
			BuildErrorCode.MANIFEST_MALFORMED,
			"dependencies",
			`Malformed requirement(s): ${malformed.join("; ")}`
		);
	}

	return requirements;
};

const isNodeError = (error: unknown): error is NodeJS.ErrnoException =>
	error instanceof Error && "code" in error;

export const readManifest = async (path: string): Promise<Requirement[]> => {
	let text: string;
	try {
		text = await readFile(path, "utf8");
	} catch (error) {
		if (isNodeError(error) && error.code === "ENOENT") {
			throw new BuildError(
				BuildErrorCode.MANIFEST_NOT_FOUND,
				"dependencies",
				`Dependency manifest ${path} not found`,
				{ cause: error }
			);
		}
		throw error;
	}

	return parseManifest(text);
};
