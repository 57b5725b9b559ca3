import { LEADER_FILE, OVERALL_FILE } from "../documents/workspace.ts";
import {
  ARCHITECT_ROLE,
  MODEL_SIGNATURE,
  REVIEW_OUTPUT_FORMAT,
  ROUND_SUMMARY_FORMAT,
  SCORE_OUTPUT_FORMAT,
  saveAs,
} from "./formats.ts";

type Sources = {
  requirements: string;
  leader: string;
};

export function overallCandidatePrompt(input: Sources & { docName: string }): string {
  return [
    ARCHITECT_ROLE,
    "Read the requirement documents and the module split document below. Once you understand the whole " +
      `business, write the overall design document ${input.docName}.`,
    saveAs(input.docName),
    `## Input documents\n\n${input.requirements}\n\n${input.leader}`,
    "## Design requirements\n\n" +
      "The document must contain the following chapters, each with concrete content rather than placeholders:\n\n" +
      "1. Business architecture\n" +
      "   - every module and its layer of responsibility\n" +
      "   - a dependency diagram between modules (ASCII or prose) with explicit directions\n" +
      "2. Business drivers\n" +
      "   - for each module: UI interaction, process driven, scheduled, or event driven\n" +
      "   - the reason for each choice\n" +
      "3. Recommended design patterns\n" +
      "   - whether a pattern (CQRS, Event Sourcing, Saga, Repository, ...) suits the architecture\n" +
      "   - how to apply it and what it brings, or why none applies\n" +
      "4. Business flow sequence diagrams\n" +
      "   - one cross-module sequence diagram for each of the 2-3 core scenarios\n" +
      "   - participants, messages and return values\n" +
      "5. Technology stack\n" +
      "   - backend language and framework, with reasons\n" +
      "   - middleware (message queue, cache, ...), with reasons\n" +
      "6. Technical architecture\n" +
      "   - layer diagram (presentation, application, domain, infrastructure)\n" +
      "   - responsibilities and boundaries of every layer\n" +
      "7. Database choice\n" +
      "   - the choice and why it fits the business data\n" +
      "   - the split of responsibilities when several databases are used",
    MODEL_SIGNATURE,
  ].join("\n\n");
}

export function overallScorePrompt(input: Sources & { docName: string; document: string }): string {
  return [
    `${ARCHITECT_ROLE} Review the following overall design document strictly.`,
    `## Document under review: ${input.docName}\n\nIt was written from the requirement documents and module split below.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document (file: ${LEADER_FILE})\n\n${input.leader}`,
    `## Overall design document under review (file: ${input.docName})\n\n${input.document}`,
    "## Review dimensions\n\n" +
      "1. Architecture: can the business architecture support every scenario in the requirements, is the module split clear;\n" +
      "2. Business drivers: is each module's driver reasonable, is there a better one;\n" +
      "3. Design patterns: is the recommended pattern the best fit;\n" +
      "4. Sequence diagrams: do they reflect the business flows accurately and in depth;\n" +
      "5. Technology stack: does it suit the scale and nature of the business;\n" +
      "6. Layering: are the layers clear, are the boundaries between them explicit;\n" +
      "7. Database: does the choice match the data structures and query patterns.",
    SCORE_OUTPUT_FORMAT,
  ].join("\n\n");
}

export function overallOptimizePrompt(
  input: Sources & { bestName: string; document: string; feedback: string },
): string {
  return [
    ARCHITECT_ROLE,
    `Note: save the optimized content to ${OVERALL_FILE}.`,
    `Below is the highest-scoring overall design document (${input.bestName}) and the documents it is based on.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document (file: ${LEADER_FILE})\n\n${input.leader}`,
    `## Overall design document to optimize (file: ${input.bestName})\n\n${input.document}`,
    `## Review comments (from several reviewers, judge them yourself)\n\n${input.feedback}`,
    "## Optimization requirements\n\n" +
      "1. Keep the strengths of the document. Assess every comment: adopt the reasonable ones, ignore the others and say why;\n" +
      "2. Make sure every business scenario of the requirements is covered;\n" +
      "3. Keep the chapter structure: business architecture, drivers, design patterns, sequence diagrams, " +
      "technology stack, technical architecture, database choice;\n" +
      "4. The result must be complete and concrete enough to guide module design and implementation;\n" +
      `5. Save the optimized document as ${OVERALL_FILE}.`,
  ].join("\n\n");
}

export function moduleListPrompt(input: { leader: string }): string {
  return [
    "Read the following document and extract its list of modules.",
    input.leader,
    'Respond ONLY with the module list as a JSON array and nothing else:\n["module1", "module2", "module3"]',
  ].join("\n\n");
}

export function moduleDocPrompt(
  input: Sources & { module: string; docName: string; overall: string; context: string },
): string {
  return [
    ARCHITECT_ROLE,
    `Read the documents below and write the detailed design document of the module "${input.module}".`,
    saveAs(input.docName),
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document (file: ${LEADER_FILE})\n\n${input.leader}`,
    `## Overall design document (file: ${OVERALL_FILE})\n\n${input.overall}`,
    input.context,
    "## Design requirements\n\n" +
      "The document must contain the following chapters, detailed enough to write code from:\n\n" +
      "1. Entities and Relationships\n" +
      "   - every entity and field of the module (type, required or not, description)\n" +
      "   - an entity relationship diagram in prose\n" +
      "   - complete DDL: fields, primary key (business key or surrogate id), foreign keys, indexes for common queries\n" +
      "2. Business logic\n" +
      "   - the flow and rules of every business operation\n" +
      "   - sequence or flow diagrams for complex flows\n" +
      "   - error handling and edge cases\n" +
      "3. Design patterns (where applicable)\n" +
      "   - whether a pattern applies, how, and what it brings; or why not\n" +
      "4. Interfaces Provided\n" +
      "   - every interface the module exposes\n" +
      "   - name, parameters with types, return value, business meaning\n" +
      "   - pseudo-code of the core implementation\n" +
      "5. Dependencies on other modules\n" +
      "   - every module this one depends on\n" +
      "   - for each: module name, interface name, parameters and return value",
    MODEL_SIGNATURE,
  ]
    .filter(Boolean)
    .join("\n\n");
}

export function moduleReviewPrompt(
  input: Sources & { module: string; docName: string; overall: string; document: string },
): string {
  return [
    `${ARCHITECT_ROLE} Review the detailed design document of the module "${input.module}" strictly.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document (file: ${LEADER_FILE})\n\n${input.leader}`,
    `## Overall design document (file: ${OVERALL_FILE})\n\n${input.overall}`,
    `## Module design document under review (file: ${input.docName})\n\n${input.document}`,
    "## Review dimensions\n\n" +
      "1. Requirement coverage: does the document cover every requirement of the module, consistently and without contradictions;\n" +
      "2. Buildability: is it detailed enough for a developer to write the code without asking questions;\n" +
      "3. Design patterns: where a pattern is proposed, is it reasonable, is there a better one;\n" +
      "4. Entities: are entities and relationships reasonable, accurate and complete; is the DDL complete (fields, keys, indexes);\n" +
      "5. Interfaces: are the exposed interfaces and their pseudo-code reasonable, accurate and complete;\n" +
      "6. Dependencies: are the dependencies on other modules and the interfaces needed reasonable, accurate and complete.",
    REVIEW_OUTPUT_FORMAT,
  ].join("\n\n");
}

export function moduleOptimizePrompt(
  input: { requirements: string; module: string; docName: string; overall: string; document: string; feedback: string },
): string {
  return [
    `${ARCHITECT_ROLE} The detailed design document of the module "${input.module}" must be improved according to review comments.`,
    `Note: write the optimized content directly to ${input.docName}.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Overall design document (file: ${OVERALL_FILE})\n\n${input.overall}`,
    `## Current module design document (file: ${input.docName})\n\n${input.document}`,
    `## Review comments\n\n${input.feedback}`,
    "## Optimization requirements\n\n" +
      "1. Assess every comment: adopt the reasonable ones, ignore the others;\n" +
      "2. Make sure the document covers every requirement of the module;\n" +
      "3. Keep entities, interfaces and pseudo-code complete and accurate;\n" +
      "4. Describe the interfaces needed from other modules concretely;\n" +
      `5. Save the optimized content to ${input.docName}.`,
  ].join("\n\n");
}

export function alignmentPrompt(input: {
  round: number;
  totalRounds: number;
  priorChanges: string;
  overall: string;
  modules: string;
}): string {
  return [
    `${ARCHITECT_ROLE} Align the interfaces across all module design documents (round ${input.round} of ${input.totalRounds}).`,
    input.priorChanges,
    `## Current overall design document (file: ${OVERALL_FILE})\n\n${input.overall}`,
    `## Current module design documents (including the previous round's changes)\n\n${input.modules}`,
    "## Work for this round\n\n" +
      "1. Scan every module's dependencies on other modules\n" +
      "   - find every description of an interface the module needs from another module\n" +
      "   - match it with the actual interface definition in the module depended upon\n" +
      "2. Alignment rules\n" +
      "   - if module A depends on an interface that module B already defines: reference B's definition in A " +
      "and align the parameters (field names, types, ...)\n" +
      "   - if module B does not define it yet: add the definition (with pseudo-code) to B, then reference it from A\n" +
      "3. Reuse\n" +
      "   - generalize similar interfaces into common ones instead of one special interface per scenario\n" +
      "   - keep entity names and fields identical wherever an entity is referenced across modules\n" +
      "4. Write the aligned content directly to the corresponding design_module_*.md files (only the ones that changed).",
    ROUND_SUMMARY_FORMAT,
  ]
    .filter(Boolean)
    .join("\n\n");
}

export function globalReviewPrompt(input: Sources & { overall: string; modules: string }): string {
  return [
    `${ARCHITECT_ROLE} Review all design documents as a whole.`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document (file: ${LEADER_FILE})\n\n${input.leader}`,
    `## Overall design document (file: ${OVERALL_FILE})\n\n${input.overall}`,
    `## All module design documents\n\n${input.modules}`,
    "## Review dimensions\n\n" +
      "1. Full coverage: is every business scenario of the requirements covered, consistently and without contradictions;\n" +
      "2. Buildability: are the documents detailed enough to write code without asking questions;\n" +
      "3. Design patterns: are the patterns used by each module the best fit;\n" +
      "4. Entities: are entity definitions and tables accurate and complete, are the query patterns reasonable;\n" +
      "5. Interfaces: are the exposed interfaces and pseudo-code accurate and complete;\n" +
      "6. Dependencies: are the dependencies between modules accurate and complete;\n" +
      "7. Consistency: are entities and interfaces referenced across modules named consistently.",
    REVIEW_OUTPUT_FORMAT,
  ].join("\n\n");
}

export function globalOptimizePrompt(
  input: Sources & { overall: string; modules: string; feedback: string },
): string {
  return [
    `${ARCHITECT_ROLE} Improve all design documents according to the global review comments.`,
    `Note: write the optimized content directly to the corresponding files (${OVERALL_FILE} and design_module_*.md).`,
    `## Requirement documents\n\n${input.requirements}`,
    `## Module split document (file: ${LEADER_FILE})\n\n${input.leader}`,
    `## Current overall design document (file: ${OVERALL_FILE})\n\n${input.overall}`,
    `## Current module design documents\n\n${input.modules}`,
    `## Global review comments\n\n${input.feedback}`,
    "## Optimization requirements\n\n" +
      "1. Assess every comment: adopt the reasonable ones, ignore the others;\n" +
      "2. Keep what is already reasonable, do not start over;\n" +
      "3. Keep interface references and entity definitions consistent across documents after the update;\n" +
      "4. Save every updated document to its own file.",
  ].join("\n\n");
}
