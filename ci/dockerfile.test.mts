import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.mjs";
import { renderDockerfile } from "./dockerfile.mjs";
import { planBuild } from "./plan.mjs";

describe("renderDockerfile", () => {
	it("renders the documented recipe", () => {
		const dockerfile = renderDockerfile(
			planBuild(loadConfig({ APT_RETRIES: "0" }))
		);

		expect(dockerfile).toBe(
			[
				"# Use python base image",
				"FROM python:3.13-slim-bullseye",
				"",
				"# Install essentials",
				"RUN apt-get update \\",
				"    && apt-get install -y --no-install-recommends curl git \\",
				"    && apt-get clean \\",
				"    && rm -rf /var/lib/apt/lists/*",
				"",
				"# Update pip & install dependencies",
				"COPY requirements.txt requirements.txt",
				"RUN pip install --upgrade pip \\",
				"    && pip install -r requirements.txt",
				"",
				"# To run in terminal",
				"#uvicorn main:app --host 0.0.0.0 --port 8000 --workers 4 --reload",
				"",
			].join("\n")
		);
	});

	it("ends with EXPOSE and an exec-form CMD when the launcher is wired in", () => {
		const dockerfile = renderDockerfile(
			planBuild(loadConfig({ LAUNCH: "true", WORKERS: "2", RELOAD: "false" }))
		);

		expect(dockerfile.trimEnd().split("\n").slice(-3)).toEqual([
			"# Start the ASGI server",
			"EXPOSE 8000",
			'CMD ["uvicorn","main:app","--host","0.0.0.0","--port","8000","--workers","2"]',
		]);
	});
});
