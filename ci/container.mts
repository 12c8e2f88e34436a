/**
 * The part of the Dagger `Container` API the pipeline drives. `Container`
 * satisfies it as `ImageContainer<File>`; tests substitute an in-process fake.
 */
export interface ImageContainer<F> {
	pipeline(name: string): ImageContainer<F>;
	from(address: string): ImageContainer<F>;
	withExec(args: string[]): ImageContainer<F>;
	withFile(path: string, source: F): ImageContainer<F>;
	withExposedPort(port: number): ImageContainer<F>;
	withDefaultArgs(opts: { args: string[] }): ImageContainer<F>;
	sync(): Promise<ImageContainer<F>>;
	stdout(): Promise<string>;
	publish(address: string): Promise<string>;
}

/** Resolves a path in the build context to something `withFile` accepts. */
export type SourceResolver<F> = (path: string) => F;
