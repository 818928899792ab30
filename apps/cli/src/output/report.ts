// apps/cli/src/output/report.ts
import type { Repository } from "@gitfleet/core";

export interface ReportJson {
  error: false;
  messages: string[];
  repo_messages: Record<string, string[]>;
}

/**
 * The result of one subcommand: overall messages, plus messages for each
 * repository it ran against.
 */
export class Report {
  private readonly messages: string[] = [];
  private readonly repoMessages = new Map<string, string[]>();
  private padded = false;

  /** Repositories are printed in the order given here */
  constructor(repos: readonly Repository[] = []) {
    for (const repo of repos) {
      this.repoMessages.set(repo.path, []);
    }
  }

  /** Separate the output of consecutive repositories with a blank line */
  padRepoOutput(): this {
    this.padded = true;
    return this;
  }

  addMessage(message: string): void {
    this.messages.push(message);
  }

  /**
   * Add a line for a repository the report was created with. An empty line
   * marks the repository without printing anything under it.
   */
  addRepoMessage(path: string, line: string): void {
    this.repoMessages.get(path)?.push(line);
  }

  toLines(): string[] {
    const lines = [...this.messages];
    for (const [path, messages] of this.repoMessages) {
      if (messages.length === 0) continue;
      lines.push(path);
      lines.push(...messages.filter((line) => line !== ""));
      if (this.padded) lines.push("");
    }
    return lines;
  }

  toJSON(): ReportJson {
    const repoMessages: Record<string, string[]> = {};
    for (const [path, messages] of this.repoMessages) {
      if (messages.length === 0) continue;
      repoMessages[path] = messages.filter((line) => line !== "");
    }
    return { error: false, messages: [...this.messages], repo_messages: repoMessages };
  }

  print(json: boolean): void {
    if (json) {
      console.log(JSON.stringify(this.toJSON(), null, 2));
      return;
    }
    for (const line of this.toLines()) {
      console.log(line);
    }
  }
}
