/**
 * Light file: the containing file of a top-level light class
 */

import type { SourceFileNode } from "@classview/frontend";
import type { StubFile } from "../stubs/types.js";

export class LightFile {
  readonly kind = "lightFile";
  private readonly source: SourceFileNode;
  private readonly loadStubs: () => StubFile;

  constructor(source: SourceFileNode, loadStubs: () => StubFile) {
    this.source = source;
    this.loadStubs = loadStubs;
  }

  getName(): string {
    return this.source.name;
  }

  getPackageName(): string {
    return this.source.packageName;
  }

  getSourceFile(): SourceFileNode {
    return this.source;
  }

  /** Stub file of the bundle the owning light class was built from */
  getStubFile(): StubFile {
    return this.loadStubs();
  }

  isValid(): boolean {
    return this.source.tracker.isValid;
  }
}
