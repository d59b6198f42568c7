import * as fs from 'node:fs';
import * as path from 'node:path';
import { globSync } from 'glob';
import { ExecutionError } from '../errors.ts';

export interface ArtifactUpload {
  key: string;
  /** File paths relative to the upload's working directory */
  files: string[];
}

export interface ArtifactStore {
  /**
   * Store the files matching `patterns` (paths or globs, relative to `cwd`) under `key`
   * @throws ExecutionError if nothing matches
   */
  upload(key: string, patterns: string[], cwd: string): Promise<ArtifactUpload>;
  /**
   * Restore an artifact into `destination`. Resolves with the destination path,
   * or undefined when no artifact was stored under `key`.
   */
  download(key: string, destination: string): Promise<string | undefined>;
}

export function sanitizeArtifactKey(key: string): string {
  const trimmed = key.trim();
  if (trimmed.length === 0) {
    throw new ExecutionError('Artifact name must be a non-empty string');
  }
  return trimmed.replace(/[^a-zA-Z0-9._-]/g, '_');
}

function isWithin(baseDir: string, target: string): boolean {
  const relativePath = path.relative(baseDir, target);
  return !relativePath.startsWith('..') && !path.isAbsolute(relativePath);
}

/**
 * Artifacts as directories under a root, one per key
 */
export class LocalArtifactStore implements ArtifactStore {
  constructor(private readonly root: string) {}

  private artifactPath(key: string): string {
    return path.join(this.root, sanitizeArtifactKey(key));
  }

  async upload(key: string, patterns: string[], cwd: string): Promise<ArtifactUpload> {
    const baseDir = path.resolve(cwd);
    const matchedFiles = new Set<string>();
    for (const pattern of patterns) {
      const matches = globSync(pattern, { cwd: baseDir, absolute: true, dot: true, nodir: true });
      for (const match of matches) matchedFiles.add(match);
    }

    if (matchedFiles.size === 0) {
      throw new ExecutionError(`No files matched for artifact "${key}"`);
    }

    const artifactPath = this.artifactPath(key);
    await fs.promises.rm(artifactPath, { recursive: true, force: true });
    await fs.promises.mkdir(artifactPath, { recursive: true });

    const files: string[] = [];
    for (const filePath of Array.from(matchedFiles).sort()) {
      if (!isWithin(baseDir, filePath)) {
        throw new ExecutionError(`Artifact path "${filePath}" is outside ${baseDir}`);
      }
      const relativePath = path.relative(baseDir, filePath);
      const destination = path.join(artifactPath, relativePath);
      await fs.promises.mkdir(path.dirname(destination), { recursive: true });
      await fs.promises.copyFile(filePath, destination);
      files.push(relativePath);
    }
    return { key, files };
  }

  async download(key: string, destination: string): Promise<string | undefined> {
    const artifactPath = this.artifactPath(key);
    if (!fs.existsSync(artifactPath)) return undefined;

    await fs.promises.mkdir(destination, { recursive: true });
    await fs.promises.cp(artifactPath, destination, { recursive: true, force: true });
    return destination;
  }
}

/**
 * Keeps uploads in memory without touching the filesystem. Downloads report the
 * destination without writing files.
 */
export class InMemoryArtifactStore implements ArtifactStore {
  readonly uploads = new Map<string, ArtifactUpload>();

  async upload(key: string, patterns: string[], _cwd: string): Promise<ArtifactUpload> {
    const files = patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
    if (files.length === 0) {
      throw new ExecutionError(`No files matched for artifact "${key}"`);
    }
    const upload = { key: sanitizeArtifactKey(key), files };
    this.uploads.set(upload.key, upload);
    return upload;
  }

  async download(key: string, destination: string): Promise<string | undefined> {
    return this.uploads.has(sanitizeArtifactKey(key)) ? destination : undefined;
  }
}
