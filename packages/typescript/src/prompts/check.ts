import { identityLabel } from "../llm/client.ts";
import type { Identity } from "../llm/client.ts";
import { MODEL_SIGNATURE } from "./formats.ts";

export const CHECK_SUMMARY_FILE = "requirement_insufficient.md";

export function checkReportName(index: number): string {
  return `requirement_insufficient_${index}.md`;
}

export function gapReportPrompt(input: { index: number; writer: Identity; requirements: string }): string {
  const reportName = checkReportName(input.index);
  return [
    "You are an experienced business analyst and requirements engineer. Read the requirement documents below. " +
      "They exist so that developers can write the business code directly from them, so they must meet the following standards.",
    `## Requirement documents\n\n${input.requirements}`,
    "## Standards\n\n" +
      "1. Detailed and unambiguous: every requirement has exactly one reading. Test: as a developer, could you write the code without asking?\n" +
      "2. Consistent: no contradictions, ambiguities or vague statements between requirements;\n" +
      "3. Data sources: every field and entity has an explicit source, a table column or a named external interface, and how to obtain it;\n" +
      '4. Concrete calculations: every computation gives an explicit formula or steps, never "according to certain rules";\n' +
      "5. Traceable formulas: every element of every formula comes from an earlier formula or an explicitly named data source.",
    "## Method\n\n" +
      "- Check every requirement module and requirement point one by one, not the document as a whole;\n" +
      "- For every point that misses a standard: (a) where it is, (b) why it misses, " +
      "(c) a concrete addition or a question to confirm with the business side.",
    "## Output\n\n" +
      "- If the documents meet every standard, reply: the requirement documents are clear and ready for development\n" +
      `- Otherwise write ${reportName} with this structure:\n\n` +
      `  # Requirement review report (pass ${input.index}, ${identityLabel(input.writer)})\n\n` +
      "  ## 1. Summary\n  (overall quality)\n\n" +
      "  ## 2. Issues\n  (grouped by standard, each with location + reason + suggestion)\n\n" +
      "  ## 3. Open questions (optional)\n  (ambiguous points to confirm with the business side)",
    MODEL_SIGNATURE,
  ].join("\n\n");
}

export function gapSummaryPrompt(input: { requirements: string; reports: string; reportCount: number }): string {
  return [
    "You are a senior requirements quality expert.",
    `Context: below are ${input.reportCount} review reports written by reviewers on different models about the same requirement documents.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Review reports\n\n${input.reports}`,
    "## Consolidation rules\n\n" +
      "1. Verify against the requirements: every comment must point at a real problem in the documents, add nothing they do not mention;\n" +
      "2. Deduplicate: merge identical or similar issues raised by several reviewers;\n" +
      "3. Filter: drop comments outside the scope of the documents or that are opinion rather than fact, and say why;\n" +
      "4. Order by importance: issues that affect correctness first, minor improvements last.",
    "## Output\n\n" +
      `Write ${CHECK_SUMMARY_FILE} with this structure:\n\n` +
      "# Requirement review summary\n\n" +
      "## 1. Overall assessment\n(quality of the documents and the main bottlenecks)\n\n" +
      "## 2. Issues to fix\nGrouped by type, each with:\n" +
      "  - location: document, module or requirement point\n" +
      "  - description: what the problem is\n" +
      "  - suggestion: how to add or change it\n\n" +
      "## 3. Questions for the business side (optional)",
  ].join("\n\n");
}
