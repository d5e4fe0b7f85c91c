import * as fs from 'fs-extra';
import * as path from 'path';
import fg from 'fast-glob';
import chalk from 'chalk';
import { PackageData, PackageMetadata } from './types';

/** One CMake command invocation, e.g. `set(zlib_INCLUDE_DIRS_DEBUG "/x")`. */
export interface Statement {
  command: string;
  args: string[];
  line: number;
}

export type FieldKind =
  | 'includeDirs'
  | 'defines'
  | 'frameworkDirs'
  | 'frameworks'
  | 'packageFolder';

export interface FieldRef {
  kind: FieldKind;
  pkg: string;
  config: string;
}

/**
 * Conan names its variables `<PKG>_<FIELD>_<CONFIG>`. Each rule recognizes
 * one FIELD; the package and configuration are whatever surrounds it.
 */
const FIELD_RULES: ReadonlyArray<{ kind: FieldKind; marker: string }> = [
  { kind: 'includeDirs', marker: 'INCLUDE_DIRS' },
  { kind: 'defines', marker: 'COMPILE_DEFINITIONS' },
  { kind: 'frameworkDirs', marker: 'FRAMEWORK_DIRS' },
  { kind: 'frameworks', marker: 'FRAMEWORKS' },
  { kind: 'packageFolder', marker: 'PACKAGE_FOLDER' }
];

const VARIABLE_REF = /\$\{([^}]+)\}/g;

class StatementScanner {
  private pos = 0;
  private line = 1;

  constructor(private readonly text: string) {}

  scan(): Statement[] {
    const statements: Statement[] = [];
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (ch === '#') {
        this.skipComment();
      } else if (/[A-Za-z_]/.test(ch)) {
        const statement = this.readStatement();
        if (statement) statements.push(statement);
      } else {
        this.advance();
      }
    }
    return statements;
  }

  private advance(): string {
    const ch = this.text[this.pos++];
    if (ch === '\n') this.line++;
    return ch;
  }

  private skipComment(): void {
    while (this.pos < this.text.length && this.text[this.pos] !== '\n') {
      this.pos++;
    }
  }

  private skipWhitespace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos])) {
      this.advance();
    }
  }

  private readStatement(): Statement | null {
    const line = this.line;
    let command = '';
    while (this.pos < this.text.length && /\w/.test(this.text[this.pos])) {
      command += this.advance();
    }
    this.skipWhitespace();
    if (this.text[this.pos] !== '(') {
      return null;
    }
    this.advance();

    const args: string[] = [];
    let depth = 0;
    while (this.pos < this.text.length) {
      const ch = this.text[this.pos];
      if (/\s/.test(ch)) {
        this.advance();
      } else if (ch === '#') {
        this.skipComment();
      } else if (ch === '"') {
        args.push(this.readQuoted());
      } else if (ch === ')') {
        this.advance();
        if (depth === 0) {
          return { command: command.toLowerCase(), args, line };
        }
        depth--;
      } else if (ch === '(') {
        this.advance();
        depth++;
      } else {
        args.push(this.readUnquoted());
      }
    }
    // Unterminated invocation
    return null;
  }

  private readQuoted(): string {
    this.advance();
    let value = '';
    while (this.pos < this.text.length) {
      const ch = this.advance();
      if (ch === '\\' && this.pos < this.text.length) {
        const next = this.advance();
        value += next === 'n' ? '\n' : next === 't' ? '\t' : next;
      } else if (ch === '"') {
        break;
      } else {
        value += ch;
      }
    }
    return value;
  }

  private readUnquoted(): string {
    let value = '';
    while (this.pos < this.text.length && !/[\s()#"]/.test(this.text[this.pos])) {
      value += this.advance();
    }
    return value;
  }
}

export function parseStatements(text: string): Statement[] {
  return new StatementScanner(text).scan();
}

export function classifyVariable(name: string): FieldRef | null {
  for (const rule of FIELD_RULES) {
    const token = `_${rule.marker}_`;
    const index = name.lastIndexOf(token);
    if (index <= 0) continue;
    const config = name.slice(index + token.length);
    if (!/^[A-Za-z0-9]+$/.test(config)) continue;
    return { kind: rule.kind, pkg: name.slice(0, index), config };
  }
  return null;
}

function splitList(values: string[]): string[] {
  return values
    .flatMap(value => value.split(';'))
    .map(value => value.trim())
    .filter(value => value.length > 0);
}

const MAX_EXPANSION_DEPTH = 8;

/**
 * Replace `${VAR}` references using the variables set in the same file.
 * Returns the expanded string, or the first reference that has no value.
 */
function expand(value: string, variables: Map<string, string>): { value: string } | { missing: string } {
  let current = value;
  for (let depth = 0; depth < MAX_EXPANSION_DEPTH && current.includes('${'); depth++) {
    const missing: string[] = [];
    current = current.replace(VARIABLE_REF, (ref: string, name: string) => {
      const resolved = variables.get(name);
      if (resolved === undefined) {
        missing.push(ref);
        return ref;
      }
      return resolved;
    });
    if (missing.length > 0) {
      return { missing: missing[0] };
    }
  }
  if (current.includes('${')) {
    return { missing: value };
  }
  return { value: current === value ? current : path.normalize(current) };
}

export function parseConanData(text: string, filePath: string): PackageData {
  const data: PackageData = {
    includeDirs: [],
    defines: [],
    frameworkDirs: [],
    frameworks: [],
    unresolved: []
  };

  const variables = new Map<string, string>([
    ['CMAKE_CURRENT_LIST_DIR', path.dirname(filePath)]
  ]);
  const rawIncludes: string[] = [];

  for (const statement of parseStatements(text)) {
    if (statement.command !== 'set' || statement.args.length === 0) continue;
    const [name, ...rest] = statement.args;
    const values = splitList(rest);
    variables.set(name, values.join(';'));

    const field = classifyVariable(name);
    if (!field) continue;

    switch (field.kind) {
      case 'includeDirs':
        rawIncludes.push(...values);
        break;
      case 'defines':
        data.defines.push(...values);
        break;
      case 'frameworkDirs':
        data.frameworkDirs.push(...values);
        break;
      case 'frameworks':
        data.frameworks.push(...values);
        break;
      case 'packageFolder':
        if (values.length > 0 && data.packageFolder === undefined) {
          data.packageFolder = values[0];
        }
        break;
    }
  }

  if (data.packageFolder !== undefined) {
    const folder = expand(data.packageFolder, variables);
    if ('value' in folder) {
      data.packageFolder = folder.value;
    } else {
      data.unresolved.push(folder.missing);
      data.packageFolder = undefined;
    }
  }

  for (const raw of rawIncludes) {
    const resolved = expand(raw, variables);
    if ('value' in resolved) {
      data.includeDirs.push(resolved.value);
    } else {
      data.unresolved.push(resolved.missing);
    }
  }

  if (rawIncludes.length === 0 && data.packageFolder !== undefined) {
    data.includeDirs.push(path.join(data.packageFolder, 'include'));
  }

  return data;
}

export async function parseConanDataFile(filePath: string): Promise<PackageData> {
  const text = await fs.readFile(filePath, 'utf8');
  return parseConanData(text, filePath);
}

/**
 * Sorted absolute paths of the `*-<buildtype>-<arch>-data.cmake` files that
 * belong to one build type.
 */
export async function findDataFiles(generatorsDir: string, buildType: string): Promise<string[]> {
  const pattern = `*-${fg.escapePath(buildType.toLowerCase())}-*-data.cmake`;
  const files = await fg(pattern, { cwd: generatorsDir, absolute: true, onlyFiles: true });
  return files.sort();
}

export function emptyMetadata(): PackageMetadata {
  return {
    includeDirs: new Set(),
    defines: new Set(),
    frameworkDirs: new Set(),
    frameworks: new Set()
  };
}

export async function scanGeneratorsDirectory(generatorsDir: string, buildType: string): Promise<PackageMetadata> {
  const metadata = emptyMetadata();

  for (const file of await findDataFiles(generatorsDir, buildType)) {
    const data = await parseConanDataFile(file);
    data.includeDirs.forEach(dir => metadata.includeDirs.add(dir));
    data.defines.forEach(define => metadata.defines.add(define));
    data.frameworkDirs.forEach(dir => metadata.frameworkDirs.add(dir));
    data.frameworks.forEach(framework => metadata.frameworks.add(framework));
    data.unresolved.forEach(ref => {
      console.log(chalk.gray(`  Skipped unresolved ${ref} in ${path.basename(file)}`));
    });
  }

  return metadata;
}
