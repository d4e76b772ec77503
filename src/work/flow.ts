/**
 * Flow is the composite container that names its child works.
 * Purpose: guarantee every work has a unique, immutable name before it runs.
 * Assumptions: names are dotted paths from the root flow ("root.trainer"); a nested
 * flow is attached to its parent before it receives children.
 * Usage: const root = new Flow().add("trainer", new Trainer());
 */

import { ConfigurationError } from "../core/errors.js";

import type { AnyWork } from "./work.js";

const CHILD_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export class Flow {
  private readonly children = new Map<string, AnyWork | Flow>();
  private prefix: string;

  constructor(name = "root") {
    this.prefix = name;
  }

  get name(): string {
    return this.prefix;
  }

  add(childName: string, child: AnyWork | Flow): this {
    if (!CHILD_NAME_PATTERN.test(childName)) {
      throw new ConfigurationError(
        `Invalid child name "${childName}" in flow ${this.prefix}; use letters, digits, "_" or "-"`,
      );
    }
    if (this.children.has(childName)) {
      throw new ConfigurationError(`Flow ${this.prefix} already has a child named ${childName}`);
    }

    const fullName = `${this.prefix}.${childName}`;
    if (child instanceof Flow) {
      child.rename(fullName);
    } else {
      child.assignName(fullName);
    }
    this.children.set(childName, child);
    return this;
  }

  works(): AnyWork[] {
    const out: AnyWork[] = [];
    for (const child of this.children.values()) {
      if (child instanceof Flow) {
        out.push(...child.works());
      } else {
        out.push(child);
      }
    }
    return out;
  }

  findWork(name: string): AnyWork | undefined {
    return this.works().find((work) => work.name === name);
  }

  private rename(fullName: string): void {
    if (this.children.size > 0) {
      throw new ConfigurationError(
        `Attach flow ${this.prefix} to its parent before adding children to it`,
      );
    }
    this.prefix = fullName;
  }
}
