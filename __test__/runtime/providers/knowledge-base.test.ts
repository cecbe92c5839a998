import { existsSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { UpstreamError } from "../../../agent/src/index.js";
import { KnowledgeBase } from "../../../runtime/src/providers/knowledge-base.js";
import { ScriptedOracle } from "../../helpers/fakes.js";

let root: string;

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "conductor-kb-"));
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("KnowledgeBase", () => {
  it("answers from every .txt and .md file in the directory", async () => {
    writeFileSync(join(root, "b-team.md"), "Team size: 8\n");
    writeFileSync(join(root, "a-revenue.txt"), "  Revenue grew 12%.  ");
    writeFileSync(join(root, "ignored.json"), '{"secret": true}');
    const oracle = new ScriptedOracle({ knowledge_answer: ["It grew 12%."] });
    const kb = new KnowledgeBase(root, oracle);

    await expect(kb.answer("How did revenue change?")).resolves.toBe(
      "It grew 12%.",
    );
    expect(oracle.calls).toEqual([
      {
        promptData: {
          context: "Revenue grew 12%.\n\nTeam size: 8",
          question: "How did revenue change?",
        },
        template: "knowledge_answer",
        expectJson: false,
      },
    ]);
  });

  it("reads the files once", async () => {
    writeFileSync(join(root, "notes.txt"), "first");
    const oracle = new ScriptedOracle({ knowledge_answer: ["a", "b"] });
    const kb = new KnowledgeBase(root, oracle);

    await kb.answer("q1");
    writeFileSync(join(root, "more.txt"), "second");
    await kb.answer("q2");

    expect(oracle.calls[1].promptData.context).toBe("first");
  });

  it("creates a missing directory and reports it is empty", async () => {
    const directory = join(root, "knowledge_base");
    const oracle = new ScriptedOracle();
    const kb = new KnowledgeBase(directory, oracle);

    await expect(kb.answer("anything")).resolves.toBe(
      `Knowledge base is empty. Add .txt files to the '${directory}' directory.`,
    );
    expect(existsSync(directory)).toBe(true);
    expect(oracle.calls).toHaveLength(0);
  });

  it("returns oracle failures as text", async () => {
    writeFileSync(join(root, "notes.txt"), "facts");
    const oracle = new ScriptedOracle({
      knowledge_answer: [new UpstreamError(500, "boom")],
    });
    const kb = new KnowledgeBase(root, oracle);

    await expect(kb.answer("q")).resolves.toBe(
      "Error consulting knowledge base: Completion service responded with HTTP 500: boom",
    );
  });
});
