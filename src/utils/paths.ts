import { homedir } from 'node:os';
import { isAbsolute, join, relative, resolve } from 'node:path';

export class PathResolver {
  /**
   * Get the project-local .runnel directory
   */
  static getProjectDir(cwd: string = process.cwd()): string {
    return resolve(cwd, '.runnel');
  }

  /**
   * Get the XDG config directory
   * Priority: $XDG_CONFIG_HOME/runnel or ~/.config/runnel
   */
  static getUserConfigDir(): string {
    const xdgConfigHome = process.env.XDG_CONFIG_HOME;
    if (xdgConfigHome) {
      return join(xdgConfigHome, 'runnel');
    }
    return join(homedir(), '.config', 'runnel');
  }

  /**
   * Get potential configuration file paths in order of precedence
   */
  static getConfigPaths(cwd: string = process.cwd()): string[] {
    const paths: string[] = [];

    if (process.env.RUNNEL_CONFIG) {
      paths.push(resolve(cwd, process.env.RUNNEL_CONFIG));
    }

    const projectDir = PathResolver.getProjectDir(cwd);
    paths.push(join(projectDir, 'config.yaml'));
    paths.push(join(projectDir, 'config.yml'));

    const userConfigDir = PathResolver.getUserConfigDir();
    paths.push(join(userConfigDir, 'config.yaml'));
    paths.push(join(userConfigDir, 'config.yml'));

    return paths;
  }

  /**
   * Resolve a step's working directory against the workspace root.
   * @throws Error if the directory escapes the workspace
   */
  static resolveWorkingDirectory(workspace: string, dir?: string): string {
    const root = resolve(workspace);
    if (!dir || dir.trim().length === 0) return root;

    const target = resolve(root, dir.trim());
    const rel = relative(root, target);
    if (rel.startsWith('..') || isAbsolute(rel)) {
      throw new Error(`Working directory "${dir}" is outside the workspace ${root}`);
    }
    return target;
  }
}
