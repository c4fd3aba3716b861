/**
 * Source scanner: enumerates handler files under a root directory, parses
 * them with ts-morph and collects the declarations that may carry markers.
 */
import * as path from 'node:path';
import {
  Node,
  Project,
  ts,
  type SourceFile,
  type Statement,
  type JSDocableNode,
  type PropertyDeclaration,
  type PropertySignature,
} from 'ts-morph';
import type { SchemaFieldEntry } from '../../runtime/contract.js';
import { SystemError, ErrorCodes } from '../../utils/errors.js';
import {
  globFilesSync,
  isDirectorySync,
  readFileSync,
  toPosixPath,
} from '../../utils/file-system.js';
import type {
  CommentLine,
  ScanOptions,
  ScanResult,
  ScannedDeclaration,
  ScannedFile,
} from './types.js';

/**
 * Scans a directory tree for marker-bearing declarations.
 *
 * Each scan uses its own in-memory project, so a scanner can be reused
 * across runs without leaking source files between them.
 */
export class SourceScanner {
  constructor(private readonly options: ScanOptions) {}

  /**
   * Scan `rootDir`. Throws SystemError when the directory is missing or
   * any file has a syntax error.
   */
  scan(rootDir: string): ScanResult {
    const root = path.resolve(rootDir);
    if (!isDirectorySync(root)) {
      throw new SystemError(
        ErrorCodes.DIRECTORY_NOT_FOUND,
        `Directory not found: ${root}`,
        { rootDir: root }
      );
    }

    const filePaths = globFilesSync(this.options.include, {
      cwd: root,
      ignore: this.options.exclude,
      absolute: true,
    });

    const project = new Project({
      compilerOptions: {
        allowJs: false,
        skipLibCheck: true,
        noEmit: true,
      },
      useInMemoryFileSystem: true,
    });

    const loaded: Array<{ filePath: string; relativePath: string; sourceFile: SourceFile }> = [];
    for (const filePath of filePaths) {
      const relativePath = toPosixPath(path.relative(root, filePath));
      const sourceFile = project.createSourceFile(
        `/${relativePath}`,
        this.readSource(filePath),
        { overwrite: true }
      );
      loaded.push({ filePath, relativePath, sourceFile });
    }

    const program = project.getProgram();
    const files: ScannedFile[] = [];

    for (const { filePath, relativePath, sourceFile } of loaded) {
      const [diagnostic] = program.getSyntacticDiagnostics(sourceFile);
      if (diagnostic) {
        const messageText = diagnostic.getMessageText();
        const message = typeof messageText === 'string' ? messageText : messageText.getMessageText();
        const line = diagnostic.getLineNumber() ?? 0;
        throw new SystemError(
          ErrorCodes.PARSE_ERROR,
          `Failed to parse ${relativePath}:${line}: ${message}`,
          { file: relativePath, line, diagnostic: message }
        );
      }

      const declarations = this.collectDeclarations(sourceFile);
      if (declarations.length > 0) {
        files.push({
          filePath,
          relativePath,
          packageName: packageNameFor(root, relativePath),
          declarations,
        });
      }
    }

    return { rootDir: root, files, filesScanned: loaded.length };
  }

  private readSource(filePath: string): string {
    try {
      return readFileSync(filePath);
    } catch (error) {
      throw new SystemError(
        ErrorCodes.PARSE_ERROR,
        `Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { filePath }
      );
    }
  }

  private collectDeclarations(sourceFile: SourceFile): ScannedDeclaration[] {
    const declarations: ScannedDeclaration[] = [];
    const exports = exportNamesOf(sourceFile);
    const exportName = (node: Node, name: string): string | null => {
      const names = exports.get(node);
      if (!names) return null;
      return names.includes(name) ? name : names[0] ?? null;
    };

    for (const statement of sourceFile.getStatements()) {
      const comment = leadingComment(sourceFile, statement);
      if (!this.mentionsMarker(comment)) continue;

      const line = statement.getStartLineNumber();

      if (Node.isFunctionDeclaration(statement)) {
        const name = statement.getName();
        if (!name) continue;
        declarations.push({
          kind: 'function',
          name,
          exportName: exportName(statement, name),
          line,
          comment,
          fields: [],
        });
      } else if (Node.isVariableStatement(statement)) {
        for (const variable of statement.getDeclarations()) {
          const initializer = variable.getInitializer();
          if (!Node.isArrowFunction(initializer) && !Node.isFunctionExpression(initializer)) continue;
          declarations.push({
            kind: 'function',
            name: variable.getName(),
            exportName: exportName(variable, variable.getName()),
            line,
            comment,
            fields: [],
          });
        }
      } else if (Node.isInterfaceDeclaration(statement)) {
        declarations.push({
          kind: 'structure',
          name: statement.getName(),
          exportName: exportName(statement, statement.getName()),
          line,
          comment,
          fields: statement.getProperties().map(toField),
        });
      } else if (Node.isClassDeclaration(statement)) {
        const name = statement.getName();
        if (!name) continue;
        declarations.push({
          kind: 'structure',
          name,
          exportName: exportName(statement, name),
          line,
          comment,
          fields: statement.getProperties().map(toField),
        });
      } else if (Node.isTypeAliasDeclaration(statement)) {
        const typeNode = statement.getTypeNode();
        declarations.push({
          kind: 'structure',
          name: statement.getName(),
          exportName: exportName(statement, statement.getName()),
          line,
          comment,
          fields: Node.isTypeLiteral(typeNode) ? typeNode.getProperties().map(toField) : [],
        });
      }
    }

    return declarations;
  }

  private mentionsMarker(comment: CommentLine[]): boolean {
    if (comment.length === 0) return false;
    const text = comment.map((c) => c.text).join('\n');
    return this.options.markerNames.some((name) => text.includes(`@${name}`));
  }
}

/**
 * Every name each declaration of `sourceFile` is exported under, in the
 * order the module declares its exports.
 */
export function exportNamesOf(sourceFile: SourceFile): Map<Node, string[]> {
  const names = new Map<Node, string[]>();
  for (const [name, nodes] of sourceFile.getExportedDeclarations()) {
    for (const node of nodes) {
      const list = names.get(node);
      if (list) list.push(name);
      else names.set(node, [name]);
    }
  }
  return names;
}

/**
 * The contiguous run of comments directly above `statement`. A blank line
 * between two comments, or between a comment and the statement, ends the run.
 */
export function leadingComment(sourceFile: SourceFile, statement: Statement): CommentLine[] {
  const fullText = sourceFile.getFullText();
  const ranges = ts.getLeadingCommentRanges(fullText, statement.getPos()) ?? [];
  const run: ts.CommentRange[] = [];

  let nextStart = statement.getStart();
  for (let i = ranges.length - 1; i >= 0; i--) {
    const range = ranges[i];
    if (countNewlines(fullText.slice(range.end, nextStart)) > 1) break;
    run.unshift(range);
    nextStart = range.pos;
  }

  const lines: CommentLine[] = [];
  for (const range of run) {
    const startLine = sourceFile.getLineAndColumnAtPos(range.pos).line;
    fullText.slice(range.pos, range.end).split('\n').forEach((raw, index) => {
      lines.push({ text: normalizeCommentLine(raw), line: startLine + index });
    });
  }
  return lines;
}

/**
 * Strip comment delimiters and the leading `*` of block comment lines.
 */
export function normalizeCommentLine(raw: string): string {
  let text = raw.trim();
  if (text.startsWith('//')) {
    return text.replace(/^\/\/+/, '').trim();
  }
  text = text.replace(/^\/\*+/, '');
  text = text.replace(/\*+\/$/, '');
  text = text.trim();
  if (text.startsWith('*')) {
    text = text.replace(/^\*+/, '');
  }
  return text.trim();
}

function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}

function toField(property: PropertySignature | PropertyDeclaration): SchemaFieldEntry {
  return {
    name: property.getName(),
    type: property.getTypeNode()?.getText() ?? 'unknown',
    required: !property.hasQuestionToken(),
    description: jsDocDescription(property),
  };
}

function jsDocDescription(node: JSDocableNode): string {
  return node
    .getJsDocs()
    .map((doc) => doc.getDescription().trim())
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Files in the root directory take the root's name; others take their
 * directory relative to the root.
 */
export function packageNameFor(rootDir: string, relativePath: string): string {
  const dir = path.posix.dirname(relativePath);
  return dir === '.' ? path.basename(rootDir) : dir;
}
