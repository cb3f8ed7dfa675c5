import ts from "typescript";
import type { AnnotationType } from "./ToolRecord";

const NAMED_TYPES: Record<string, AnnotationType> = {
  int: "int",
  integer: "int",
  Integer: "int",
  BigInt: "int",
  float: "float",
  double: "float",
  Number: "float",
  Boolean: "bool",
  String: "str",
  Array: "json",
  ReadonlyArray: "json",
  Record: "json",
  Partial: "json",
  Map: "json",
  ReadonlyMap: "json",
  Set: "json",
  ReadonlySet: "json",
  Object: "json",
};

/**
 * Collapses a parameter's type annotation (TypeScript or JSDoc syntax) into the
 * closed set used to describe tool parameters. Absent annotations map to "any".
 */
export function annotationTypeOf(node: ts.TypeNode | undefined): AnnotationType {
  if (!node) return "any";

  switch (node.kind) {
    case ts.SyntaxKind.NumberKeyword:
      return "float";
    case ts.SyntaxKind.BigIntKeyword:
      return "int";
    case ts.SyntaxKind.BooleanKeyword:
      return "bool";
    case ts.SyntaxKind.StringKeyword:
      return "str";
    case ts.SyntaxKind.ObjectKeyword:
    case ts.SyntaxKind.ArrayType:
    case ts.SyntaxKind.TupleType:
    case ts.SyntaxKind.TypeLiteral:
    case ts.SyntaxKind.MappedType:
      return "json";
    case ts.SyntaxKind.TemplateLiteralType:
      return "str";
  }

  if (ts.isLiteralTypeNode(node)) return literalType(node.literal);
  if (
    ts.isParenthesizedTypeNode(node) ||
    ts.isTypeOperatorNode(node) ||
    ts.isJSDocNullableType(node) ||
    ts.isJSDocNonNullableType(node) ||
    ts.isJSDocOptionalType(node)
  ) {
    return annotationTypeOf(node.type);
  }
  if (ts.isTypeReferenceNode(node)) {
    const name = ts.isIdentifier(node.typeName) ? node.typeName.text : node.typeName.right.text;
    return NAMED_TYPES[name] ?? "any";
  }
  if (ts.isUnionTypeNode(node)) return unionType(node.types);

  return "any";
}

function literalType(literal: ts.LiteralTypeNode["literal"]): AnnotationType {
  if (ts.isNumericLiteral(literal)) return Number.isInteger(Number(literal.text)) ? "int" : "float";
  if (ts.isBigIntLiteral(literal)) return "int";
  if (ts.isStringLiteral(literal) || ts.isNoSubstitutionTemplateLiteral(literal)) return "str";
  if (literal.kind === ts.SyntaxKind.TrueKeyword || literal.kind === ts.SyntaxKind.FalseKeyword) {
    return "bool";
  }
  if (ts.isPrefixUnaryExpression(literal) && ts.isNumericLiteral(literal.operand)) {
    return Number.isInteger(Number(literal.operand.text)) ? "int" : "float";
  }
  return "any";
}

function isNullish(node: ts.TypeNode): boolean {
  return (
    node.kind === ts.SyntaxKind.UndefinedKeyword ||
    node.kind === ts.SyntaxKind.VoidKeyword ||
    (ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword)
  );
}

function unionType(members: ts.NodeArray<ts.TypeNode>): AnnotationType {
  const types = new Set(members.filter((member) => !isNullish(member)).map(annotationTypeOf));
  if (types.size !== 1) {
    // 1 | 2.5 is still numeric
    if (types.size === 2 && types.has("int") && types.has("float")) return "float";
    return "any";
  }
  const [only] = types;
  return only;
}
