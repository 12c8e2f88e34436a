import type { Container, File } from "@dagger.io/dagger";
import { describe, expectTypeOf, it } from "vitest";
import type { ImageContainer } from "./container.mjs";
import { FakeContainer } from "./fake-container.mjs";

describe("ImageContainer", () => {
	it("is satisfied by the Dagger container", () => {
		expectTypeOf<Container>().toMatchTypeOf<ImageContainer<File>>();
		expectTypeOf<
			Container["withDefaultArgs"]
		>().parameter(0).toMatchTypeOf<{ args?: string[] } | undefined>();
	});

	it("is satisfied by the in-process fake", () => {
		expectTypeOf<FakeContainer>().toMatchTypeOf<ImageContainer<string>>();
	});
});
