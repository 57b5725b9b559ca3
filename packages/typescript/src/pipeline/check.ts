import { CHECK_SUMMARY_FILE, checkReportName, gapReportPrompt, gapSummaryPrompt } from "../prompts/check.ts";
import { PipelineBase } from "./base.ts";

export type RequirementCheckReport = {
  reports: string[];
  output: string;
  calls: number;
};

/** Several writers audit the requirements for gaps, then one reviewer consolidates their reports. */
export class RequirementCheckPipeline extends PipelineBase {
  async run(): Promise<RequirementCheckReport> {
    const requirements = this.workspace.readRequirementDocs();
    const reports: string[] = [];

    this.step("check: gap reports");
    for (let index = 1; index <= this.settings.candidates; index += 1) {
      const writer = this.writerFor(index);
      reports.push(checkReportName(index));
      await this.generator.submit(gapReportPrompt({ index, writer, requirements }), writer);
    }

    this.step("check: consolidate reports");
    await this.generator.submit(
      gapSummaryPrompt({
        requirements,
        reports: reports.map((name) => this.workspace.readDocument(name)).join("\n"),
        reportCount: reports.length,
      }),
      this.primaryReviewer,
    );
    this.log.info({ output: CHECK_SUMMARY_FILE, calls: this.callCount }, "requirement check finished");

    return { reports, output: CHECK_SUMMARY_FILE, calls: this.callCount };
  }
}
