import type { ImageContainer } from "./container.mjs";

export type FakeEngine = {
	/** Output of `stdout()`, keyed by the space-joined argv of the last exec. */
	readonly outputs?: Record<string, string>;
	/** `sync()` and `stdout()` reject once an exec containing this text was applied. */
	readonly failOn?: string;
};

/**
 * Records every call instead of talking to a Dagger engine. Like the real
 * `Container`, each call returns a new instance and nothing runs until
 * `sync()` or `stdout()`.
 */
export class FakeContainer implements ImageContainer<string> {
	constructor(
		private readonly engine: FakeEngine = {},
		readonly ops: readonly string[] = [],
		private readonly execs: readonly string[] = []
	) {}

	private next(op: string, exec?: string): FakeContainer {
		return new FakeContainer(
			this.engine,
			[...this.ops, op],
			exec === undefined ? this.execs : [...this.execs, exec]
		);
	}

	private evaluate(): void {
		const { failOn } = this.engine;
		const failed = failOn && this.execs.find((exec) => exec.includes(failOn));
		if (failed) {
			throw new Error(
				`process "${failed}" did not complete successfully: exit code: 100`
			);
		}
	}

	pipeline(name: string): FakeContainer {
		return this.next(`pipeline ${name}`);
	}

	from(address: string): FakeContainer {
		return this.next(`from ${address}`);
	}

	withExec(args: string[]): FakeContainer {
		const exec = args.join(" ");
		return this.next(`exec ${exec}`, exec);
	}

	withFile(path: string, source: string): FakeContainer {
		return this.next(`file ${path} <- ${source}`);
	}

	withExposedPort(port: number): FakeContainer {
		return this.next(`expose ${port}`);
	}

	withDefaultArgs(opts: { args: string[] }): FakeContainer {
		return this.next(`args ${JSON.stringify(opts.args)}`);
	}

	async sync(): Promise<FakeContainer> {
		this.evaluate();
		return this;
	}

	async stdout(): Promise<string> {
		this.evaluate();
		const last = this.execs[this.execs.length - 1] ?? "";
		return this.engine.outputs?.[last] ?? "";
	}

	async publish(address: string): Promise<string> {
		this.evaluate();
		return `${address}@sha256:${"0".repeat(64)}`;
	}
}
