import { describe, expect, it } from "vitest";
import { normalizeArguments, type ArgumentAliasTable } from "./aliases.js";

describe("normalizeArguments", () => {
    it("renames the first alias present to the canonical name", () => {
        expect(normalizeArguments("edit_document", { old_string: "foo", new: "bar" })).toEqual({
            old_str: "foo",
            new_str: "bar",
        });
    });

    it("follows alias priority order", () => {
        const args = { doc_id: "plan.md", old: "low", old_string: "high", new_string: "x" };
        expect(normalizeArguments("edit_document", args)).toEqual({
            doc_id: "plan.md",
            old_str: "high",
            new_str: "x",
        });
    });

    it("leaves canonical arguments unchanged", () => {
        const args = { doc_id: "plan.md", old_str: "a", new_str: "b" };
        const once = normalizeArguments("edit_document", args);
        expect(once).toEqual(args);
        expect(normalizeArguments("edit_document", once)).toEqual(args);
    });

    it("keeps the canonical value and drops a competing alias", () => {
        expect(normalizeArguments("edit_document", { old_str: "kept", old: "dropped", new_str: "n" })).toEqual({
            old_str: "kept",
            new_str: "n",
        });
    });

    it("never invents a missing parameter", () => {
        expect(normalizeArguments("edit_document", { doc_id: "spec.txt", new: "only new" })).toEqual({
            doc_id: "spec.txt",
            new_str: "only new",
        });
    });

    it("does not touch tools without an entry", () => {
        const args = { old: "x" };
        expect(normalizeArguments("read_doc_contents", args)).toEqual({ old: "x" });
    });

    it("does not mutate its input", () => {
        const args = { old_string: "foo" };
        normalizeArguments("edit_document", args);
        expect(args).toEqual({ old_string: "foo" });
    });

    it("uses a custom table", () => {
        const table: ArgumentAliasTable = { search: { query: ["q", "text"] } };
        expect(normalizeArguments("search", { text: "mcp" }, table)).toEqual({ query: "mcp" });
    });
});
