import { join, resolve } from 'node:path';
import { mkdir } from 'node:fs/promises';

/**
 * Layout of one runs directory.
 *
 *   <root>/<runId>/meta.json
 *   <root>/<runId>/prompt_v<N>.md
 *   <root>/<runId>/report_v<N>.md
 *   <root>/<runId>/sources_v<N>.json
 */
export class RunPaths {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  runDir(runId: string): string {
    return join(this.root, runId);
  }

  metadataPath(runId: string): string {
    return join(this.runDir(runId), 'meta.json');
  }

  promptPath(runId: string, version: number): string {
    return join(this.runDir(runId), `prompt_v${version}.md`);
  }

  reportPath(runId: string, version: number): string {
    return join(this.runDir(runId), `report_v${version}.md`);
  }

  sourcesPath(runId: string, version: number): string {
    return join(this.runDir(runId), `sources_v${version}.json`);
  }
}

export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}
