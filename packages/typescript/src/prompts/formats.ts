import { ROUND_SUMMARY_MARKER } from "../refinement/alignment.ts";

export const ARCHITECT_ROLE = "You are a senior software architect.";

/** Output contract for convergence reviews. */
export const REVIEW_OUTPUT_FORMAT =
  "Respond ONLY with the following JSON and nothing else:\n" +
  "```json\n" +
  "{\n" +
  '  "satisfied": true or false,\n' +
  '  "issues": ["<concrete issue 1 (location + reason)>", "<concrete issue 2>"],\n' +
  '  "suggestions": "<overall improvement advice, empty string when there is nothing to fix>",\n' +
  '  "score": <integer from 0 to 100>\n' +
  "}\n" +
  "```\n" +
  "Rules:\n" +
  "- satisfied is true if and only if the document fully meets the requirements and issues is empty;\n" +
  "- whenever there is any problem, satisfied must be false and every problem must be listed in issues;\n" +
  "- score reflects overall quality, 100 is the maximum.";

/** Output contract for candidate scoring, where only the score ranks documents. */
export const SCORE_OUTPUT_FORMAT =
  "Respond ONLY with the following JSON and nothing else:\n" +
  "```json\n" +
  "{\n" +
  '  "issues": ["<concrete issue 1 (location + reason)>", "<concrete issue 2>"],\n' +
  '  "suggestions": "<overall improvement advice>",\n' +
  '  "score": <integer from 0 to 100>\n' +
  "}\n" +
  "```\n" +
  "Rules:\n" +
  "- list every unreasonable or improvable point in issues; use an empty list when there is none;\n" +
  "- score reflects overall quality, 100 is the maximum.";

export const ROUND_SUMMARY_FORMAT =
  "When you are done, end your reply with a summary of this round's changes in exactly this format, " +
  "for the next round to build on:\n" +
  `${ROUND_SUMMARY_MARKER}\n` +
  "- Module X, interface Y: aligned parameter Z (old type -> new type)\n" +
  "- Module B: added interface defineXxx(), parameters ..., returns ...\n" +
  '- (write "no new changes this round" when nothing changed)';

export const MODEL_SIGNATURE = "Note: state on the first line of the document which model you are.";

export const NO_SUGGESTIONS = "(no specific suggestions; improve the document generally against the requirements)";

export function saveAs(name: string): string {
  return `Note: the document you produce is named ${name}. Save the content to that file.`;
}
