import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { extname, join } from "node:path";

import { head } from "../utils.ts";

export const LEADER_FILE = "requirement_leader.md";
export const OVERALL_FILE = "design_overall.md";
export const REQUIREMENT_DIR = "requirement";

const TEXT_EXTENSIONS = new Set([".md", ".txt"]);
const MODULE_DOC_PATTERN = /^design_module_.+\.md$/;
const HEADING_PATTERN = /^(#{1,6})\s+(.*)$/;

export const INTERFACE_KEYWORDS = ["Interfaces Provided", "Public Interface", "Interface Definition", "Interfaces", "API"];
export const ENTITY_KEYWORDS = ["Entities and Relationships", "Entity Relationships", "Entity Definition", "Entities", "Data Model"];

export const MODULE_CONTEXT_FALLBACK_CHARS = 500;

export function moduleDocName(module: string): string {
  return `design_module_${module}.md`;
}

/**
 * Pulls the sections whose heading contains one of `keywords`, each running
 * until the next heading of the same or a higher level.
 */
export function extractSections(content: string, keywords: readonly string[]): string {
  const extracted: string[] = [];
  let inside = false;
  let currentLevel = 0;

  for (const line of content.split(/\r?\n/)) {
    const heading = HEADING_PATTERN.exec(line);
    if (heading) {
      const level = (heading[1] ?? "").length;
      const title = heading[2] ?? "";
      if (keywords.some((keyword) => title.includes(keyword))) {
        inside = true;
        currentLevel = level;
        extracted.push(line);
      } else if (inside) {
        if (level <= currentLevel) {
          inside = false;
        } else {
          extracted.push(line);
        }
      }
    } else if (inside) {
      extracted.push(line);
    }
  }

  return extracted.join("\n").trim();
}

/**
 * Read side of the directory the model server writes documents into.
 */
export class DocumentWorkspace {
  readonly root: string;
  readonly requirementDir: string;

  constructor(root: string, requirementDir = REQUIREMENT_DIR) {
    this.root = root;
    this.requirementDir = requirementDir;
  }

  path(name: string): string {
    return join(this.root, name);
  }

  exists(name: string): boolean {
    return existsSync(this.path(name));
  }

  readRaw(name: string): string | null {
    const path = this.path(name);
    if (!existsSync(path)) {
      return null;
    }
    return readFileSync(path, "utf8");
  }

  /** File content wrapped in header and footer lines naming the file. */
  readDocument(name: string): string {
    const raw = this.readRaw(name);
    if (raw === null) {
      return `[missing file: ${name}]`;
    }
    return `=== file: ${name} ===\n${raw.trim()}\n=== end of file: ${name} ===\n`;
  }

  /**
   * Inlines the text requirement documents. Other formats (pdf, docx, ...)
   * are only listed so the agent can open them itself.
   */
  readRequirementDocs(): string {
    const dir = this.path(this.requirementDir);
    const files = existsSync(dir)
      ? readdirSync(dir)
          .sort()
          .map((name) => join(this.requirementDir, name))
          .filter((name) => statSync(this.path(name)).isFile())
      : [];
    if (files.length === 0) {
      return "[no requirement documents found]";
    }

    const textParts: string[] = [];
    const otherPaths: string[] = [];
    for (const file of files) {
      if (TEXT_EXTENSIONS.has(extname(file).toLowerCase())) {
        textParts.push(this.readDocument(file));
      } else {
        otherPaths.push(file);
      }
    }

    let result = textParts.join("\n");
    if (otherPaths.length > 0) {
      result +=
        "\n\n[The following requirement files are not plain text, read them directly]\n" +
        otherPaths.map((path) => `- ${path}`).join("\n");
    }
    return result.trim();
  }

  moduleDocNames(): string[] {
    if (!existsSync(this.root)) {
      return [];
    }
    return readdirSync(this.root)
      .filter((name) => MODULE_DOC_PATTERN.test(name))
      .sort();
  }

  readModuleDesignDocs(exclude: readonly string[] = []): string {
    const names = this.moduleDocNames().filter((name) => !exclude.includes(name));
    if (names.length === 0) {
      return "[no module design documents found]";
    }
    return names.map((name) => this.readDocument(name)).join("\n");
  }

  /**
   * Entity and interface sections of the module documents written so far,
   * so that the next module does not define conflicting names.
   */
  buildModuleContext(doneModules: readonly string[]): string {
    const parts = ["## Entities and interfaces of modules already designed (reference only, avoid conflicting definitions)"];

    for (const module of doneModules) {
      const name = moduleDocName(module);
      const raw = this.readRaw(name);
      if (raw === null) {
        continue;
      }

      const interfaces = extractSections(raw, INTERFACE_KEYWORDS);
      const entities = extractSections(raw, ENTITY_KEYWORDS);

      if (!interfaces && !entities) {
        parts.push(
          `--- module: ${module} (file: ${name}, sections not found, document excerpt follows) ---\n` +
            head(raw, MODULE_CONTEXT_FALLBACK_CHARS),
        );
        continue;
      }

      let sectionText = "";
      if (entities) {
        sectionText += `### Entities (from ${name})\n${entities}\n\n`;
      }
      if (interfaces) {
        sectionText += `### Interfaces (from ${name})\n${interfaces}\n`;
      }
      parts.push(`--- module: ${module} (file: ${name}) ---\n${sectionText}`);
    }

    return parts.length > 1 ? parts.join("\n\n") : "";
  }
}
