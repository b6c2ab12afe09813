import { describe, expect, it } from 'vitest';

import { buildStackKey, identityPrefix } from '../stackcollapse/stackKey';
import { native, sample } from './fixtures';

describe("identityPrefix", () => {
    const s = sample("cpu-cycles", native("main"), { comm: "RenderThread", pid: 1200, tid: 1234 });

    it("formats each identity mode", () => {
        expect(identityPrefix(s, "none")).toBeUndefined();
        expect(identityPrefix(s, "comm")).toBe("RenderThread");
        expect(identityPrefix(s, "pid")).toBe("RenderThread-1200");
        expect(identityPrefix(s, "tid")).toBe("RenderThread-1200/1234");
    });
});

describe("buildStackKey", () => {
    it("reverses leaf-first frames into a root-first key", () => {
        expect(buildStackKey(["main", "foo", "bar"])).toBe("bar;foo;main");
    });

    it("puts the identity prefix outermost", () => {
        expect(buildStackKey(["bar", "foo", "main"], "app-100")).toBe("app-100;main;foo;bar");
    });

    it("keys empty stacks under [unknown]", () => {
        expect(buildStackKey([])).toBe("[unknown]");
        expect(buildStackKey([], "app-100")).toBe("app-100;[unknown]");
    });

    it("leaves the input untouched", () => {
        const frames = ["bar", "foo"];
        buildStackKey(frames, "app");
        expect(frames).toEqual(["bar", "foo"]);
    });

    it("distinguishes frame order", () => {
        expect(buildStackKey(["a", "b"])).not.toBe(buildStackKey(["b", "a"]));
    });
});
