import ts from "typescript";
import type { JsonValue } from "../../ports/sys/AuditLogPort";
import { annotationTypeOf } from "./annotationType";
import type { ArgumentSlot, ParameterDescriptor, ToolSignature } from "./ToolRecord";

type FunctionNode = ts.FunctionDeclaration | ts.FunctionExpression | ts.ArrowFunction | ts.MethodDeclaration;

interface ToolDeclaration {
  fn: FunctionNode;
  /** Node the JSDoc block hangs off (the function, or its variable declaration). */
  docHost: ts.Node;
}

export function parseSource(fileName: string, source: string): ts.SourceFile {
  const kind = /\.(c|m)?js$/.test(fileName) ? ts.ScriptKind.JS : ts.ScriptKind.TS;
  return ts.createSourceFile(fileName, source, ts.ScriptTarget.ES2022, true, kind);
}

/**
 * Signature of the top-level function `name` as declared in the source. Returns
 * null when no declaration with that name is found.
 */
export function reflectDeclaredSignature(sourceFile: ts.SourceFile, name: string): ToolSignature | null {
  const declaration = findDeclaration(sourceFile, name);
  if (!declaration) return null;
  return buildSignature(declaration.fn, sourceFile, docstringOf(declaration.docHost, sourceFile));
}

/**
 * Fallback for callables that were assigned in ways the declaration scan does not
 * follow (e.g. `exports.name = ...`): reflect on the function's own text.
 */
export function reflectRuntimeSignature(fnText: string): ToolSignature {
  for (const candidate of [`(${fnText})`, `({ ${fnText} })`]) {
    const sourceFile = ts.createSourceFile("callable.js", candidate, ts.ScriptTarget.ES2022, true, ts.ScriptKind.JS);
    const fn = findFirstFunction(sourceFile);
    if (fn) return buildSignature(fn, sourceFile, null);
  }
  return { parameters: [], slots: [], docstring: null, returnAnnotation: null };
}

function findDeclaration(sourceFile: ts.SourceFile, name: string): ToolDeclaration | null {
  for (const statement of sourceFile.statements) {
    if (ts.isFunctionDeclaration(statement) && statement.name?.text === name) {
      // skip overload signatures; the implementation carries the body
      if (!statement.body) continue;
      return { fn: statement, docHost: statement };
    }
    if (ts.isVariableStatement(statement)) {
      for (const declaration of statement.declarationList.declarations) {
        if (!ts.isIdentifier(declaration.name) || declaration.name.text !== name) continue;
        const fn = declaration.initializer && unwrapFunction(declaration.initializer);
        if (fn) return { fn, docHost: declaration };
      }
    }
  }
  return null;
}

function unwrapFunction(expression: ts.Expression): FunctionNode | null {
  if (ts.isArrowFunction(expression) || ts.isFunctionExpression(expression)) return expression;
  if (
    ts.isParenthesizedExpression(expression) ||
    ts.isAsExpression(expression) ||
    ts.isSatisfiesExpression(expression)
  ) {
    return unwrapFunction(expression.expression);
  }
  return null;
}

function findFirstFunction(node: ts.Node): FunctionNode | null {
  if (
    ts.isFunctionExpression(node) ||
    ts.isArrowFunction(node) ||
    ts.isMethodDeclaration(node) ||
    ts.isFunctionDeclaration(node)
  ) {
    return node;
  }
  let found: FunctionNode | null = null;
  ts.forEachChild(node, (child) => {
    if (!found) found = findFirstFunction(child);
  });
  return found;
}

function docstringOf(host: ts.Node, sourceFile: ts.SourceFile): string | null {
  const blocks = ts.getJSDocCommentsAndTags(host).filter(ts.isJSDoc);
  const block = blocks[blocks.length - 1];
  if (!block) return null;
  const text = block
    .getText(sourceFile)
    .replace(/^\/\*\*\s?/, "")
    .replace(/\s*\*\/$/, "")
    .split("\n")
    .map((line) => line.replace(/^\s*\* ?/, "").trimEnd())
    .join("\n")
    .trim();
  return text || null;
}

function buildSignature(fn: FunctionNode, sourceFile: ts.SourceFile, docstring: string | null): ToolSignature {
  const parameters: ParameterDescriptor[] = [];
  const slots: ArgumentSlot[] = [];

  fn.parameters.forEach((param, index) => {
    if (ts.isIdentifier(param.name) && param.name.text === "this") return;

    if (ts.isObjectBindingPattern(param.name)) {
      slots.push(describeKeywords(param, param.name, sourceFile, parameters));
      return;
    }

    const name = ts.isIdentifier(param.name) ? param.name.text : `arg${index}`;
    const typeNode = param.type ?? ts.getJSDocType(param);
    const annotation = {
      type: ts.isArrayBindingPattern(param.name) && !typeNode ? ("json" as const) : annotationTypeOf(typeNode),
      raw: typeNode ? typeNode.getText(sourceFile) : null,
    };

    if (param.dotDotDotToken) {
      parameters.push({ name, kind: "var-positional", required: false, default: null, annotation });
      slots.push({ kind: "rest", name });
      return;
    }

    const required = !param.initializer && !param.questionToken && !isJSDocOptional(typeNode);
    parameters.push({
      name,
      kind: "positional-or-keyword",
      required,
      default: param.initializer ? literalValue(param.initializer, sourceFile) : null,
      annotation,
    });
    slots.push({ kind: "positional", name, required });
  });

  const returnType = fn.type ?? ts.getJSDocReturnType(fn);
  return {
    parameters,
    slots,
    docstring,
    returnAnnotation: returnType ? returnType.getText(sourceFile) : null,
  };
}

/** Members of a destructured object parameter become keyword-only parameters. */
function describeKeywords(
  param: ts.ParameterDeclaration,
  pattern: ts.ObjectBindingPattern,
  sourceFile: ts.SourceFile,
  parameters: ParameterDescriptor[]
): ArgumentSlot {
  const typeNode = param.type ?? ts.getJSDocType(param);
  const members = new Map<string, ts.PropertySignature>();
  if (typeNode && ts.isTypeLiteralNode(typeNode)) {
    for (const member of typeNode.members) {
      if (ts.isPropertySignature(member) && (ts.isIdentifier(member.name) || ts.isStringLiteral(member.name))) {
        members.set(member.name.text, member);
      }
    }
  }
  const optionalObject = Boolean(param.initializer || param.questionToken);

  const names: string[] = [];
  const required: string[] = [];
  let restName: string | null = null;

  for (const element of pattern.elements) {
    const local = ts.isIdentifier(element.name) ? element.name.text : null;
    if (element.dotDotDotToken) {
      restName = local ?? "kwargs";
      parameters.push({
        name: restName,
        kind: "var-keyword",
        required: false,
        default: null,
        annotation: { type: "json", raw: null },
      });
      continue;
    }

    const key = element.propertyName
      ? propertyKey(element.propertyName, sourceFile)
      : local ?? element.name.getText(sourceFile);
    const member = members.get(key);
    const isRequired = !element.initializer && !member?.questionToken && !optionalObject;

    names.push(key);
    if (isRequired) required.push(key);
    parameters.push({
      name: key,
      kind: "keyword-only",
      required: isRequired,
      default: element.initializer ? literalValue(element.initializer, sourceFile) : null,
      annotation: {
        type: annotationTypeOf(member?.type),
        raw: member?.type ? member.type.getText(sourceFile) : null,
      },
    });
  }

  return { kind: "keywords", names, required, restName };
}

function propertyKey(name: ts.PropertyName, sourceFile: ts.SourceFile): string {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) return name.text;
  return name.getText(sourceFile);
}

function isJSDocOptional(typeNode: ts.TypeNode | undefined): boolean {
  return Boolean(typeNode && ts.isJSDocOptionalType(typeNode));
}

/**
 * Default values are reported as data when they are plain literals; any other
 * initializer is reported as its source text.
 */
function literalValue(expression: ts.Expression, sourceFile: ts.SourceFile): JsonValue {
  if (ts.isParenthesizedExpression(expression) || ts.isAsExpression(expression)) {
    return literalValue(expression.expression, sourceFile);
  }
  if (ts.isNumericLiteral(expression)) return Number(expression.text);
  if (ts.isStringLiteral(expression) || ts.isNoSubstitutionTemplateLiteral(expression)) {
    return expression.text;
  }
  switch (expression.kind) {
    case ts.SyntaxKind.TrueKeyword:
      return true;
    case ts.SyntaxKind.FalseKeyword:
      return false;
    case ts.SyntaxKind.NullKeyword:
      return null;
  }
  if (ts.isIdentifier(expression) && expression.text === "undefined") return null;
  if (
    ts.isPrefixUnaryExpression(expression) &&
    expression.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(expression.operand)
  ) {
    return -Number(expression.operand.text);
  }
  if (ts.isArrayLiteralExpression(expression)) {
    return expression.elements.map((element) => literalValue(element, sourceFile));
  }
  if (ts.isObjectLiteralExpression(expression)) {
    const out: Record<string, JsonValue> = {};
    for (const property of expression.properties) {
      if (!ts.isPropertyAssignment(property)) return expression.getText(sourceFile);
      out[propertyKey(property.name, sourceFile)] = literalValue(property.initializer, sourceFile);
    }
    return out;
  }
  return expression.getText(sourceFile);
}
