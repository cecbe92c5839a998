/**
 * Answers questions from a folder of private notes.
 *
 * Every .txt and .md file in the directory is concatenated into one
 * context block and handed to the completion service together with the
 * question. The files are read once, on first use; restart to pick up
 * edits.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync } from "fs";
import { join } from "path";
import {
  completeText,
  describeError,
  type CompletionOracle,
} from "../../../agent/src/index.js";
import type { KnowledgeProvider } from "../capabilities.js";

const KNOWLEDGE_EXTENSIONS = [".txt", ".md"];

export class KnowledgeBase implements KnowledgeProvider {
  private knowledge: string | undefined;

  constructor(
    private readonly directory: string,
    private readonly oracle: CompletionOracle,
  ) {}

  async answer(query: string): Promise<string> {
    try {
      const knowledge = this.load();
      if (!knowledge) {
        return `Knowledge base is empty. Add .txt files to the '${this.directory}' directory.`;
      }
      return await completeText(
        this.oracle,
        { context: knowledge, question: query },
        "knowledge_answer",
      );
    } catch (error) {
      return `Error consulting knowledge base: ${describeError(error)}`;
    }
  }

  private load(): string {
    if (this.knowledge !== undefined) return this.knowledge;

    if (!existsSync(this.directory)) {
      mkdirSync(this.directory, { recursive: true });
      this.knowledge = "";
      return this.knowledge;
    }

    const files = readdirSync(this.directory)
      .filter((name) =>
        KNOWLEDGE_EXTENSIONS.some((ext) => name.toLowerCase().endsWith(ext)),
      )
      .sort();

    this.knowledge = files
      .map((name) => readFileSync(join(this.directory, name), "utf-8").trim())
      .filter(Boolean)
      .join("\n\n");
    return this.knowledge;
  }
}
