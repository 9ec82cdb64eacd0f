import fs from 'fs';
import path from 'path';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { ConfigImportError, ConfigNotFoundError } from '../utils/errors.js';

const log = logger.child({ component: 'config-store' });

export const CONFIG_EXTENSION = '.ovpn';

// Directives whose first argument names a file the configuration depends on
const FILE_DIRECTIVES = ['ca', 'cert', 'key', 'tls-auth', 'tls-crypt', 'pkcs12', 'auth-user-pass'];

const VALID_NAME = /^[A-Za-z0-9._-]+$/;

export function isValidConfigName(name: string): boolean {
  return VALID_NAME.test(name) && name !== '.' && name !== '..';
}

const INLINE_FILE = '[inline]';

function referencedFile(rawLine: string): string | null {
  const line = rawLine.trim();
  if (!line || line.startsWith('#') || line.startsWith(';')) return null;

  const [directive, file] = line.split(/\s+/);
  if (!directive || !file || file === INLINE_FILE || !FILE_DIRECTIVES.includes(directive)) {
    return null;
  }
  return file;
}

/**
 * List the auxiliary files a configuration references, as written in the file
 */
export function findReferencedFiles(contents: string): string[] {
  const files: string[] = [];
  for (const rawLine of contents.split('\n')) {
    const file = referencedFile(rawLine);
    if (file) {
      files.push(file);
    }
  }
  return files;
}

export class ConfigStore {
  private baseDir: string;

  constructor(baseDir?: string) {
    this.baseDir = baseDir ?? config.vpn.configDir;
    this.ensureBaseDir();
  }

  private ensureBaseDir(): void {
    if (!fs.existsSync(this.baseDir)) {
      fs.mkdirSync(this.baseDir, { recursive: true });
      log.info({ baseDir: this.baseDir }, 'Created configuration directory');
    }
  }

  /**
   * Copy a configuration file and the files it references into its own
   * directory. References are rewritten to the copied file names, so the
   * bundle works from its directory. Returns the configuration name.
   */
  importConfig(sourcePath: string): string {
    const resolved = path.resolve(sourcePath);
    if (!fs.existsSync(resolved) || !fs.statSync(resolved).isFile()) {
      throw new ConfigImportError(sourcePath, 'file does not exist');
    }

    const name = path.basename(resolved, CONFIG_EXTENSION);
    if (!isValidConfigName(name)) {
      throw new ConfigImportError(sourcePath, `'${name}' is not a usable configuration name`);
    }

    const targetDir = path.join(this.baseDir, name);
    fs.mkdirSync(targetDir, { recursive: true });

    const contents = fs.readFileSync(resolved, 'utf-8');
    const sourceDir = path.dirname(resolved);
    let copied = 0;

    const lines = contents.split('\n').map(rawLine => {
      const reference = referencedFile(rawLine);
      if (!reference) return rawLine;

      const referencePath = path.isAbsolute(reference) ? reference : path.join(sourceDir, reference);
      if (!fs.existsSync(referencePath)) {
        log.warn({ name, reference }, 'Referenced file not found, skipping');
        return rawLine;
      }

      const fileName = path.basename(referencePath);
      fs.copyFileSync(referencePath, path.join(targetDir, fileName));
      copied++;
      return fileName === reference ? rawLine : rawLine.replace(reference, fileName);
    });

    fs.writeFileSync(path.join(targetDir, `${name}${CONFIG_EXTENSION}`), lines.join('\n'));
    log.info({ name, targetDir, copied }, 'Imported configuration');
    return name;
  }

  listConfigs(): string[] {
    try {
      const entries = fs.readdirSync(this.baseDir, { withFileTypes: true });
      return entries
        .filter(e => e.isDirectory())
        .map(e => e.name)
        .sort();
    } catch (err) {
      log.error({ err, baseDir: this.baseDir }, 'Failed to list configurations');
      return [];
    }
  }

  resolveConfigPath(name: string): string {
    if (!isValidConfigName(name)) {
      throw new ConfigNotFoundError(name);
    }

    const configPath = path.join(this.baseDir, name, `${name}${CONFIG_EXTENSION}`);
    if (!fs.existsSync(configPath)) {
      throw new ConfigNotFoundError(name);
    }

    return configPath;
  }
}
