/**
 * Structural checks on a generated module. Read-only.
 */
import * as path from 'node:path';
import { Node, Project, SyntaxKind } from 'ts-morph';
import { PostValidationError, ErrorCodes } from '../../utils/errors.js';
import { fileExistsSync, readFileSync } from '../../utils/file-system.js';

export interface PostValidationOptions {
  /** Name of the exported startup function */
  entryPoint: string;
  /** Method name of the registration call, default `registerRoute` */
  registrationCall?: string;
  /** Fail when the entry point issues no registration call, default true */
  requireRegistrations?: boolean;
}

export interface PostValidationResult {
  filePath: string;
  imports: number;
  registrations: number;
}

/**
 * Validate the generated file at `filePath`. Throws PostValidationError
 * naming the first failed check.
 */
export function validateGeneratedFile(
  filePath: string,
  options: PostValidationOptions
): PostValidationResult {
  const absolute = path.resolve(filePath);
  if (!fileExistsSync(absolute)) {
    throw new PostValidationError(
      ErrorCodes.GENERATED_FILE_NOT_FOUND,
      `Generated file not found: ${absolute}`,
      { filePath: absolute }
    );
  }

  const content = readFileSync(absolute);
  if (content.trim() === '') {
    throw new PostValidationError(
      ErrorCodes.GENERATED_FILE_EMPTY,
      `Generated file is empty: ${absolute}`,
      { filePath: absolute }
    );
  }

  return validateGeneratedSource(content, absolute, options);
}

/**
 * Validate generated source text. `filePath` is used for the parser and
 * error messages only.
 */
export function validateGeneratedSource(
  content: string,
  filePath: string,
  options: PostValidationOptions
): PostValidationResult {
  const registrationCall = options.registrationCall ?? 'registerRoute';
  const project = new Project({
    compilerOptions: { noEmit: true, skipLibCheck: true },
    useInMemoryFileSystem: true,
  });
  const sourceFile = project.createSourceFile(`/${path.basename(filePath)}`, content, { overwrite: true });

  const [diagnostic] = project.getProgram().getSyntacticDiagnostics(sourceFile);
  if (diagnostic) {
    const messageText = diagnostic.getMessageText();
    const message = typeof messageText === 'string' ? messageText : messageText.getMessageText();
    const line = diagnostic.getLineNumber() ?? 0;
    throw new PostValidationError(
      ErrorCodes.GENERATED_SYNTAX_ERROR,
      `Syntax error in generated file ${filePath}:${line}: ${message}`,
      { filePath, line, diagnostic: message }
    );
  }

  const imports = sourceFile.getImportDeclarations().length;
  if (imports === 0) {
    throw new PostValidationError(
      ErrorCodes.MISSING_IMPORTS,
      `Generated file ${filePath} has no imports`,
      { filePath }
    );
  }

  const entry = sourceFile.getFunction(options.entryPoint);
  if (!entry) {
    throw new PostValidationError(
      ErrorCodes.MISSING_ENTRY_POINT,
      `Generated file ${filePath} does not declare function '${options.entryPoint}'`,
      { filePath, entryPoint: options.entryPoint }
    );
  }

  const registrations = entry.getDescendantsOfKind(SyntaxKind.CallExpression).filter((callExpr) => {
    const callee = callExpr.getExpression();
    return Node.isPropertyAccessExpression(callee) && callee.getName() === registrationCall;
  }).length;

  if (registrations === 0 && options.requireRegistrations !== false) {
    throw new PostValidationError(
      ErrorCodes.MISSING_REGISTRATIONS,
      `'${options.entryPoint}' in ${filePath} makes no ${registrationCall} call`,
      { filePath, entryPoint: options.entryPoint, registrationCall }
    );
  }

  return { filePath, imports, registrations };
}
