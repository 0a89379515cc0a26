/**
 * Compiler facade: runs the analysis engine over every tracked source and
 * owns the resulting snapshot.
 */
import { DocumentStore } from "./documents";
import type { AnalysisEngine, AnalysisSnapshot } from "./syntax";
import { type CompilerOptions, DEFAULT_OPTIONS } from "./types";

export class CompilerFacade {
  options: CompilerOptions = DEFAULT_OPTIONS;
  private current: AnalysisSnapshot | undefined;

  constructor(
    private readonly engine: AnalysisEngine,
    private readonly documents: DocumentStore,
    private readonly log: (message: string) => void,
  ) {}

  get hasSnapshot(): boolean {
    return this.current !== undefined;
  }

  get snapshot(): AnalysisSnapshot | undefined {
    return this.current;
  }

  /**
   * Re-analyzes all tracked sources (not only `path`, since imports resolve
   * across files) and replaces the snapshot, diagnostics included, whatever
   * the outcome. Returns false when `path` is not tracked.
   */
  compile(path: string): boolean {
    if (!this.documents.has(path)) {
      this.log(`source code not found for path: ${path}`);
      return false;
    }

    this.current = this.engine.analyze({
      sources: this.documents.sources(),
      options: this.options,
    });
    return true;
  }
}
