import { describe, expect, it } from "vitest";
import { err, map, ok, unwrap } from "./result.js";

describe("Result", () => {
	it("ok wraps a value", () => {
		const r = ok(42);
		expect(r.ok).toBe(true);
		if (r.ok) expect(r.value).toBe(42);
	});

	it("err wraps an error", () => {
		const r = err("something failed");
		expect(r.ok).toBe(false);
		if (!r.ok) expect(r.error).toBe("something failed");
	});

	it("map transforms ok and passes err through", () => {
		expect(map(ok(5), (x) => x * 2)).toEqual(ok(10));
		expect(map(err("nope"), (x: number) => x * 2)).toEqual(err("nope"));
	});

	it("unwrap returns the value or throws the error", () => {
		expect(unwrap(ok("v"))).toBe("v");
		const boom = new Error("boom");
		expect(() => unwrap(err(boom))).toThrow(boom);
		expect(() => unwrap(err("text"))).toThrow("text");
	});
});
