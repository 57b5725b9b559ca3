import { LEADER_FILE, OVERALL_FILE, moduleDocName } from "../documents/workspace.ts";
import type { CandidateScore } from "../judges/selection.ts";
import {
  alignmentPrompt,
  globalOptimizePrompt,
  globalReviewPrompt,
  moduleDocPrompt,
  moduleListPrompt,
  moduleOptimizePrompt,
  moduleReviewPrompt,
  overallCandidatePrompt,
  overallOptimizePrompt,
  overallScorePrompt,
} from "../prompts/design.ts";
import { AlignmentPropagator } from "../refinement/alignment.ts";
import type { AlignmentArtifacts } from "../refinement/alignment.ts";
import { RefinementConfig, RefinementLoop } from "../refinement/loop.ts";
import type { RefinementArtifact, RefinementOutcome } from "../refinement/loop.ts";
import { normalizeQuotes } from "../utils.ts";
import { PipelineBase } from "./base.ts";
import { CandidateRound } from "./candidates.ts";
import type { CandidatePrompts } from "./candidates.ts";

export type DesignReport = {
  overall: {
    output: string;
    bestCandidate: string;
    scores: Array<{ name: string; totalScore: number; issueCount: number }>;
  };
  modules: string[];
  moduleOutcomes: RefinementOutcome[];
  alignmentSummary: string;
  globalOutcome: RefinementOutcome | null;
  calls: number;
};

export function overallCandidateName(candidateId: number): string {
  return `design_overall_${candidateId}.md`;
}

function jsonStringArray(text: string): string[] | null {
  try {
    const parsed: unknown = JSON.parse(text);
    if (!Array.isArray(parsed)) {
      return null;
    }
    return parsed.filter((item): item is string => typeof item === "string");
  } catch {
    return null;
  }
}

/**
 * Reads a module list from a reply: the first `[...]` span as a JSON array,
 * otherwise every double-quoted or bracket-quoted name. Names are trimmed,
 * stripped of path separators and deduplicated.
 */
export function parseModuleList(reply: string | null): string[] {
  if (!reply) {
    return [];
  }

  let names: string[] = [];
  const span = /\[[\s\S]*?\]/.exec(reply);
  if (span) {
    names = jsonStringArray(span[0]) ?? jsonStringArray(normalizeQuotes(span[0])) ?? [];
  }
  if (names.length === 0) {
    names = [...reply.matchAll(/["“「『【]([^"”「」『』【】\n]+)["”」』】]/g)].map((match) => match[1] ?? "");
  }

  const cleaned = names.map((name) => name.trim().replace(/[\\/]/g, "-")).filter(Boolean);
  return [...new Set(cleaned)];
}

export class DesignPipeline extends PipelineBase {
  private refinementConfig(): RefinementConfig {
    return new RefinementConfig({ refinementFactor: this.settings.refinementFactor });
  }

  overallPrompts(): CandidatePrompts {
    const ws = this.workspace;
    return {
      candidateName: overallCandidateName,
      generatePrompt: (candidateId) =>
        overallCandidatePrompt({
          docName: overallCandidateName(candidateId),
          requirements: ws.readRequirementDocs(),
          leader: ws.readDocument(LEADER_FILE),
        }),
      scorePrompt: (candidateId) =>
        overallScorePrompt({
          docName: overallCandidateName(candidateId),
          requirements: ws.readRequirementDocs(),
          leader: ws.readDocument(LEADER_FILE),
          document: ws.readDocument(overallCandidateName(candidateId)),
        }),
      optimizePrompt: (best: CandidateScore, feedback: string) =>
        overallOptimizePrompt({
          bestName: overallCandidateName(best.candidateId),
          requirements: ws.readRequirementDocs(),
          leader: ws.readDocument(LEADER_FILE),
          document: ws.readDocument(overallCandidateName(best.candidateId)),
          feedback,
        }),
    };
  }

  moduleArtifact(module: string): RefinementArtifact {
    const ws = this.workspace;
    const docName = moduleDocName(module);
    return {
      name: docName,
      reviewPrompt: async () =>
        moduleReviewPrompt({
          module,
          docName,
          requirements: ws.readRequirementDocs(),
          leader: ws.readDocument(LEADER_FILE),
          overall: ws.readDocument(OVERALL_FILE),
          document: ws.readDocument(docName),
        }),
      optimizePrompt: async (feedback) =>
        moduleOptimizePrompt({
          module,
          docName,
          requirements: ws.readRequirementDocs(),
          overall: ws.readDocument(OVERALL_FILE),
          document: ws.readDocument(docName),
          feedback,
        }),
    };
  }

  documentSetArtifact(): RefinementArtifact {
    const ws = this.workspace;
    return {
      name: "all design documents",
      reviewPrompt: async () =>
        globalReviewPrompt({
          requirements: ws.readRequirementDocs(),
          leader: ws.readDocument(LEADER_FILE),
          overall: ws.readDocument(OVERALL_FILE),
          modules: ws.readModuleDesignDocs(),
        }),
      optimizePrompt: async (feedback) =>
        globalOptimizePrompt({
          requirements: ws.readRequirementDocs(),
          leader: ws.readDocument(LEADER_FILE),
          overall: ws.readDocument(OVERALL_FILE),
          modules: ws.readModuleDesignDocs(),
          feedback,
        }),
    };
  }

  alignmentArtifacts(): AlignmentArtifacts {
    const ws = this.workspace;
    return {
      alignmentPrompt: async (round) =>
        alignmentPrompt({
          ...round,
          overall: ws.readDocument(OVERALL_FILE),
          modules: ws.readModuleDesignDocs(),
        }),
    };
  }

  async listModules(): Promise<string[]> {
    this.step("design: list modules");
    const reply = await this.generator.submit(
      moduleListPrompt({ leader: this.workspace.readDocument(LEADER_FILE) }),
      this.primaryWriter,
    );
    const modules = parseModuleList(reply);
    if (modules.length === 0) {
      this.log.error({ leader: LEADER_FILE }, "could not read a module list from the module split document");
    } else {
      this.log.info({ modules }, "modules found");
    }
    return modules;
  }

  async generateModuleDocs(modules: readonly string[]): Promise<void> {
    this.step("design: generate module documents");
    for (const [idx, module] of modules.entries()) {
      const writer = this.writerFor(idx + 1);
      const docName = moduleDocName(module);
      this.log.info({ module, index: idx + 1, of: modules.length, docName }, "generating module document");
      await this.generator.submit(
        moduleDocPrompt({
          module,
          docName,
          requirements: this.workspace.readRequirementDocs(),
          leader: this.workspace.readDocument(LEADER_FILE),
          overall: this.workspace.readDocument(OVERALL_FILE),
          context: this.workspace.buildModuleContext(modules.slice(0, idx)),
        }),
        writer,
      );
    }
  }

  async refineModules(modules: readonly string[]): Promise<RefinementOutcome[]> {
    this.step("design: review and optimize modules");
    const outcomes: RefinementOutcome[] = [];
    for (const module of modules) {
      const loop = new RefinementLoop(
        this.reviewers,
        this.primaryWriter,
        this.generator,
        this.refinementConfig(),
        this.log.child({ module }),
      );
      outcomes.push(await loop.run(this.moduleArtifact(module)));
    }
    return outcomes;
  }

  async alignInterfaces(): Promise<string> {
    this.step("design: align interfaces");
    const propagator = new AlignmentPropagator(this.writers, this.generator, this.settings.alignRounds, this.log);
    return propagator.run(this.alignmentArtifacts());
  }

  async refineAll(): Promise<RefinementOutcome> {
    this.step("design: global review and optimize");
    const loop = new RefinementLoop(this.reviewers, this.primaryWriter, this.generator, this.refinementConfig(), this.log);
    return loop.run(this.documentSetArtifact());
  }

  async run(): Promise<DesignReport> {
    const round = new CandidateRound(this.generator, this.writers, this.reviewers, this.settings.candidates, this.log);
    const prompts = this.overallPrompts();

    this.step("design: generate overall candidates");
    await round.generate(prompts);
    this.step("design: score overall candidates");
    const board = await round.score(prompts);
    this.step("design: optimize best overall candidate");
    const overall = await round.optimize(prompts, board);

    const report: DesignReport = {
      overall: {
        output: OVERALL_FILE,
        bestCandidate: overall.bestName,
        scores: overall.scores.map((entry) => ({
          name: overallCandidateName(entry.candidateId),
          totalScore: entry.totalScore,
          issueCount: entry.issueCount,
        })),
      },
      modules: [],
      moduleOutcomes: [],
      alignmentSummary: "",
      globalOutcome: null,
      calls: 0,
    };

    const modules = await this.listModules();
    if (modules.length === 0) {
      report.calls = this.callCount;
      return report;
    }
    report.modules = modules;

    await this.generateModuleDocs(modules);
    report.moduleOutcomes = await this.refineModules(modules);
    report.alignmentSummary = await this.alignInterfaces();
    report.globalOutcome = await this.refineAll();
    report.calls = this.callCount;

    this.log.info({ calls: report.calls, modules: modules.length }, "design finished");
    return report;
  }
}
