// PEP 440 public version with an optional local segment
const VERSION =
	/^v?(?:(\d+)!)?(\d+(?:\.\d+)*)(?:[-_.]?(a|b|c|rc|alpha|beta|pre|preview)[-_.]?(\d+)?)?(?:-(\d+)|[-_.]?(post|rev|r)[-_.]?(\d+)?)?(?:[-_.]?(dev)[-_.]?(\d+)?)?(?:\+([a-z0-9]+(?:[-_.][a-z0-9]+)*))?$/;

const PRE_RELEASE: Record<string, string> = {
	a: "a",
	alpha: "a",
	b: "b",
	beta: "b",
	c: "rc",
	rc: "rc",
	pre: "rc",
	preview: "rc",
};

export type Version = {
	/** Canonical public version, trailing zero release components dropped. */
	readonly public: string;
	readonly local: string | null;
};

const int = (digits: string | undefined): number =>
	digits === undefined ? 0 : Number.parseInt(digits, 10);

export const parseVersion = (raw: string): Version | null => {
	const match = VERSION.exec(raw.trim().toLowerCase());
	if (!match) return null;

	const [, epoch, release, pre, preN, postImplicit, post, postN, dev, devN, local] =
		match;

	const parts = release.split(".").map((part) => int(part));
	while (parts.length > 1 && parts[parts.length - 1] === 0) parts.pop();

	let canonical = int(epoch) > 0 ? `${int(epoch)}!` : "";
	canonical += parts.join(".");
	if (pre !== undefined) canonical += `${PRE_RELEASE[pre]}${int(preN)}`;
	if (postImplicit !== undefined) canonical += `.post${int(postImplicit)}`;
	else if (post !== undefined) canonical += `.post${int(postN)}`;
	if (dev !== undefined) canonical += `.dev${int(devN)}`;

	return {
		public: canonical,
		local: local === undefined ? null : local.replace(/[-_]/g, "."),
	};
};

/**
 * Whether an installed version satisfies `==pinned`. The installed local
 * segment only matters when the pin names one.
 */
export const satisfiesPin = (pinned: string, installed: string): boolean => {
	const want = parseVersion(pinned);
	const have = parseVersion(installed);
	if (!want || !have) return pinned.trim() === installed.trim();
	if (want.public !== have.public) return false;
	return want.local === null || want.local === have.local;
};
