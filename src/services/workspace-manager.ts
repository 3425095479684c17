import * as path from "path";
import { spawn } from "child_process";
import {
  DEFAULT_EDITOR,
  STARTED_AT_FILENAME,
  INPUT_EXTENSION,
  OUTPUT_EXTENSION,
  SOLUTION_FILENAME,
  SOLUTION_TEMPLATE,
} from "../constants";
import { Problem } from "../types";
import * as fsUtils from "../utils/fs-utils";
import { SampleStore } from "./sample-store";

export interface WorkspaceManagerOptions {
  baseDir: string;
  samples: SampleStore;
  template?: string;
  editor?: string;
  quiet?: boolean;
}

export interface Workspace {
  dir: string;
  solutionPath: string;
  createdSolution: boolean;
}

/**
 * Prepares one directory per problem holding the solution file and the
 * seeded sample test
 */
export class WorkspaceManager {
  private readonly template: string;
  private readonly editor: string;

  constructor(private readonly options: WorkspaceManagerOptions) {
    this.template = options.template ?? SOLUTION_TEMPLATE;
    this.editor = options.editor ?? DEFAULT_EDITOR;
  }

  workspaceDir(problem: Problem): string {
    return path.join(
      this.options.baseDir,
      problem.contestId,
      String(problem.id)
    );
  }

  solutionPath(problem: Problem): string {
    return path.join(this.workspaceDir(problem), SOLUTION_FILENAME);
  }

  /**
   * Create the workspace for a problem. An existing solution file is left
   * untouched; test_1.in / test_1.out are rewritten from the first sample.
   * @throws SamplesNotFoundError before anything is written when no samples
   * are cached
   */
  async setupWorkspace(problem: Problem): Promise<Workspace> {
    const samples = await this.options.samples.getSamples(
      problem.contestId,
      String(problem.id)
    );

    const dir = await fsUtils.ensureDirectory(this.workspaceDir(problem));
    const solutionPath = path.join(dir, SOLUTION_FILENAME);

    const createdSolution = !(await fsUtils.fileExists(solutionPath));
    if (createdSolution) {
      await fsUtils.writeFile(solutionPath, this.template);
    }

    const [firstSample] = samples;
    await Promise.all([
      fsUtils.writeFile(path.join(dir, `test_1${INPUT_EXTENSION}`), firstSample.input),
      fsUtils.writeFile(path.join(dir, `test_1${OUTPUT_EXTENSION}`), firstSample.output),
    ]);

    if (!this.options.quiet) {
      console.log(`Workspace ready at ${dir}`);
    }
    return { dir, solutionPath, createdSolution };
  }

  /**
   * Remember when the learner started working on the problem
   */
  async markStarted(problem: Problem, startedAt: Date): Promise<void> {
    const dir = await fsUtils.ensureDirectory(this.workspaceDir(problem));
    await fsUtils.writeFile(
      path.join(dir, STARTED_AT_FILENAME),
      startedAt.toISOString()
    );
  }

  async startedAt(problem: Problem): Promise<Date | undefined> {
    const marker = path.join(this.workspaceDir(problem), STARTED_AT_FILENAME);
    if (!(await fsUtils.fileExists(marker))) return undefined;

    const value = new Date((await fsUtils.readFile(marker)).trim());
    return Number.isNaN(value.getTime()) ? undefined : value;
  }

  /**
   * Open a file in the configured editor and wait for it to exit
   */
  openEditor(filePath: string): Promise<number | null> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.editor, [filePath], { stdio: "inherit" });
      child.on("error", reject);
      child.on("close", (code) => resolve(code));
    });
  }
}
