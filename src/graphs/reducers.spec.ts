import { describe, expect, it } from "vitest";
import { appendReducer, replaceReducer } from "./reducers";

describe("replaceReducer", () => {
    it("returns the update", () => {
        expect(replaceReducer({ a: 1 }, { a: 2 })).toEqual({ a: 2 });
    });
});

describe("appendReducer", () => {
    it("concatenates in order without touching its inputs", () => {
        const current = ["a"];
        const update = ["b", "c"];
        expect(appendReducer(current, update)).toEqual(["a", "b", "c"]);
        expect(current).toEqual(["a"]);
    });

    it("is associative", () => {
        const left = appendReducer(appendReducer(["a"], ["b"]), ["c"]);
        const right = appendReducer(["a"], appendReducer(["b"], ["c"]));
        expect(left).toEqual(right);
    });

    it("rejects values that are not arrays", () => {
        expect(() => appendReducer([], JSON.parse("null"))).toThrow(
            new TypeError("append reducer expects two arrays, got array and null"),
        );
    });
});
