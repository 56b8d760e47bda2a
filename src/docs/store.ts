/**
 * docs/store.ts — Document storage behind the document server's tools
 *
 * The server receives a store at construction time, so every test can hand in
 * its own isolated instance.
 */

export interface DocumentStore {
    get(id: string): string | undefined;
    put(id: string, content: string): void;
    list(): string[];
}

export const SAMPLE_DOCUMENTS: Readonly<Record<string, string>> = {
    "deposition.md": "This deposition covers the testimony of Angela Smith, P.E.",
    "report.pdf": "The report details the state of a 20m condenser tower.",
    "financials.docx": "These financials outline the project's budget and expenditures.",
    "outlook.pdf": "This document presents the projected future performance of the system.",
    "plan.md": "The plan outlines the steps for the project's implementation.",
    "spec.txt": "These specifications define the technical requirements for the equipment.",
};

export class InMemoryDocumentStore implements DocumentStore {
    private readonly docs: Map<string, string>;

    constructor(seed: Readonly<Record<string, string>> = SAMPLE_DOCUMENTS) {
        this.docs = new Map(Object.entries(seed));
    }

    get(id: string): string | undefined {
        return this.docs.get(id);
    }

    put(id: string, content: string): void {
        this.docs.set(id, content);
    }

    list(): string[] {
        return [...this.docs.keys()];
    }
}
