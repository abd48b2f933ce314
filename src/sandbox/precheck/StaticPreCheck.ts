import ts from 'typescript';
import { normalizeModuleName, type Policy } from '../policy/Policy.js';
import type { Violation, ViolationKind } from '../types.js';

/** Reported for `require(x)` / `import(x)` whose argument is not a string literal. */
export const DYNAMIC_SPECIFIER = '<dynamic>';

/**
 * Scan a snippet for disallowed imports and blocked identifiers.
 *
 * Returns every distinct violation in source order. The parser is error tolerant,
 * so malformed source still gets checked; its syntax errors surface later from the
 * transpiler.
 */
export function check(sourceText: string, policy: Policy): Violation[] {
  const sourceFile = ts.createSourceFile(
    'snippet.ts',
    sourceText,
    ts.ScriptTarget.ES2022,
    false,
    ts.ScriptKind.TS,
  );

  const violations: Violation[] = [];
  const seen = new Set<string>();

  const report = (kind: ViolationKind, identifier: string): void => {
    const key = `${kind}\u0000${identifier}`;
    if (seen.has(key)) return;
    seen.add(key);
    violations.push({ kind, identifier });
  };

  const checkSpecifier = (specifier: ts.Expression | undefined): void => {
    if (specifier && ts.isStringLiteralLike(specifier)) {
      if (!policy.allowedImports.has(normalizeModuleName(specifier.text))) {
        report('DisallowedImport', specifier.text);
      }
      return;
    }
    report('DisallowedImport', DYNAMIC_SPECIFIER);
  };

  const visit = (node: ts.Node): void => {
    if (ts.isImportDeclaration(node)) {
      checkSpecifier(node.moduleSpecifier);
    } else if (ts.isExportDeclaration(node) && node.moduleSpecifier) {
      checkSpecifier(node.moduleSpecifier);
    } else if (
      ts.isImportEqualsDeclaration(node) &&
      ts.isExternalModuleReference(node.moduleReference)
    ) {
      checkSpecifier(node.moduleReference.expression);
    } else if (ts.isCallExpression(node) && isModuleLoaderCall(node)) {
      checkSpecifier(node.arguments[0]);
    } else if (ts.isIdentifier(node) && policy.blockedNames.has(node.text)) {
      report('BlockedName', node.text);
    } else if (
      ts.isElementAccessExpression(node) &&
      ts.isStringLiteralLike(node.argumentExpression) &&
      policy.blockedNames.has(node.argumentExpression.text)
    ) {
      report('BlockedName', node.argumentExpression.text);
    }

    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return violations;
}

function isModuleLoaderCall(node: ts.CallExpression): boolean {
  if (node.expression.kind === ts.SyntaxKind.ImportKeyword) return true;
  return ts.isIdentifier(node.expression) && node.expression.text === 'require';
}
