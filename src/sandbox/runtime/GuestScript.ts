import ts from 'typescript';
import { GuestRuntimeError } from '../errors.js';
import { sanitizeErrorText } from '../result/ErrorSanitizer.js';
import { LAUNCH_BINDING } from './RestrictedContext.js';

const COMPILER_OPTIONS: ts.CompilerOptions = {
  module: ts.ModuleKind.CommonJS,
  target: ts.ScriptTarget.ES2022,
  esModuleInterop: true,
};

/**
 * Transpile a JavaScript/TypeScript snippet into code for a restricted context.
 *
 * The body is wrapped in an async function so top-level `await` and `return` work.
 * Running the result only hands that function to the context launcher. Every
 * value import is loaded up front, including ones the compiler would elide as
 * unused, so a disallowed import fails even when its binding is never read.
 */
export function transpileSnippet(sourceText: string): string {
  const output = ts.transpileModule(sourceText, {
    compilerOptions: COMPILER_OPTIONS,
    fileName: 'snippet.ts',
    reportDiagnostics: true,
  });

  const diagnostic = output.diagnostics?.find(
    (candidate) => candidate.category === ts.DiagnosticCategory.Error && candidate.file,
  );
  if (diagnostic) {
    throw toSyntaxError(diagnostic);
  }

  // Kept on the opening line so reported line numbers match the snippet.
  const imports = importedModules(sourceText);
  const prologue = imports.length
    ? `'use strict'; ${imports.map((name) => `require(${JSON.stringify(name)});`).join(' ')}`
    : '';
  return `${LAUNCH_BINDING}(async function (exports) { ${prologue}\n${output.outputText}\n});`;
}

/** Module specifiers of every non-type-only import in the snippet, in source order. */
export function importedModules(sourceText: string): string[] {
  const file = ts.createSourceFile('snippet.ts', sourceText, ts.ScriptTarget.ES2022, false);
  const names: string[] = [];

  for (const statement of file.statements) {
    if (ts.isImportDeclaration(statement)) {
      if (statement.importClause?.isTypeOnly) continue;
      if (ts.isStringLiteral(statement.moduleSpecifier)) {
        names.push(statement.moduleSpecifier.text);
      }
    } else if (
      ts.isImportEqualsDeclaration(statement) &&
      !statement.isTypeOnly &&
      ts.isExternalModuleReference(statement.moduleReference) &&
      ts.isStringLiteral(statement.moduleReference.expression)
    ) {
      names.push(statement.moduleReference.expression.text);
    }
  }
  return names;
}

function toSyntaxError(diagnostic: ts.Diagnostic): GuestRuntimeError {
  const text = ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n');
  if (!diagnostic.file || diagnostic.start === undefined) {
    return new GuestRuntimeError('SyntaxError', sanitizeErrorText(text));
  }
  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  return new GuestRuntimeError(
    'SyntaxError',
    sanitizeErrorText(`${text} (line ${line + 1}, column ${character + 1})`),
  );
}
