import { LEADER_FILE } from "../documents/workspace.ts";
import { MODEL_SIGNATURE, SCORE_OUTPUT_FORMAT, saveAs } from "./formats.ts";

const SPLIT_ROLE = "You are an experienced system architect.";

export function splitCandidatePrompt(input: { docName: string; requirements: string }): string {
  return [
    `${SPLIT_ROLE} Read the requirement documents below and, once you understand the whole business, design the module split.`,
    `## Requirement documents\n\n${input.requirements}`,
    "## Split principles\n\n" +
      "1. High cohesion, low coupling: each module owns one group of closely related business, with minimal dependencies between modules;\n" +
      "2. Clear boundaries: every module has an explicit responsibility, with no overlap;\n" +
      "3. One-way dependencies: avoid dependency cycles between modules;\n" +
      "4. Split dimension: when the business has several dimensions, use the most central one for the first level and " +
      "split by the others inside each module, or split directly by the cross product (A1B1, A1B2, A2B1, ...);\n" +
      "5. Lower complexity: the split must clearly reduce implementation and comprehension complexity.",
    "## Output format\n\n" +
      `${saveAs(input.docName)} Structure:\n\n` +
      "# Module split design\n\n" +
      "## 1. Rationale\nWhy this split was chosen and its core idea.\n\n" +
      "## 2. Modules\nFor every module:\n- name\n- responsibility (what it owns and what it does not)\n" +
      "- core features\n- overview of the main operations and interfaces it exposes\n\n" +
      "## 3. Overview\n- module dependency diagram (prose or ASCII)\n" +
      "- core business flows: how requests move between modules in the main scenarios\n" +
      "- calling conventions: direction of calls, how data is passed",
    MODEL_SIGNATURE,
  ].join("\n\n");
}

export function splitScorePrompt(input: { docName: string; requirements: string; document: string }): string {
  return [
    `${SPLIT_ROLE} Review the following module split document strictly.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document under review (file: ${input.docName})\n\n${input.document}`,
    "## Review dimensions\n\n" +
      "1. Requirement coverage: do the modules cover every requirement, is any business scenario missing;\n" +
      "2. Boundaries: is each module's responsibility clear, are boundaries ambiguous or overlapping;\n" +
      "3. Cohesion: are the features inside each module closely related;\n" +
      "4. Coupling: are there too many dependencies or cycles, are directions reasonable;\n" +
      "5. Extensibility: does the split accommodate future business growth;\n" +
      "6. Overview chapter: is the dependency diagram clear, are flows complete, are conventions reasonable;\n" +
      "7. Readability: is the document easy for developers to understand and implement.",
    SCORE_OUTPUT_FORMAT,
  ].join("\n\n");
}

export function splitOptimizePrompt(
  input: { bestName: string; requirements: string; document: string; feedback: string },
): string {
  return [
    SPLIT_ROLE,
    `Note: save the final optimized document as ${LEADER_FILE}.`,
    `Below is the highest-scoring module split document (${input.bestName}) and the requirements it is based on.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document to optimize (file: ${input.bestName})\n\n${input.document}`,
    "## Optimization requirements\n\n" +
      "1. Make sure every business scenario of the requirements is covered;\n" +
      "2. Assess every review comment below: adopt the reasonable ones, ignore the others and say why;\n" +
      "3. Keep the parts that are already reasonable, do not start over;\n" +
      "4. Keep the structure: rationale, modules (with boundaries and core features), overview (dependencies, flows, conventions);\n" +
      "5. The result must be clear, complete and ready to guide detailed design.",
    `## Review comments (from several reviewers, for reference only)\n\n${input.feedback}`,
    `Save the final optimized document as ${LEADER_FILE}.`,
  ].join("\n\n");
}
