/**
 * Record lookup and field listing
 */

import ts from "typescript";
import {
  RecordDeclaration,
  RecordField,
  RecordType,
} from "../ir/types.js";
import { nodePosition } from "../program/diagnostics.js";
import { SourceUnit, describeLocation } from "../program/types.js";
import { Diagnostic, errorDiagnostic } from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import { readMetadata } from "./metadata.js";

const unwrapParentheses = (node: ts.TypeNode): ts.TypeNode =>
  ts.isParenthesizedTypeNode(node) ? unwrapParentheses(node.type) : node;

/**
 * The parts of an object type alias: `{ ... }`, `A & { ... }` or a plain
 * reference. Undefined when the alias is not record-shaped.
 */
const aliasParts = (
  declaration: ts.TypeAliasDeclaration
): readonly (ts.TypeLiteralNode | ts.TypeReferenceNode)[] | undefined => {
  const type = unwrapParentheses(declaration.type);
  const members = ts.isIntersectionTypeNode(type)
    ? type.types.map(unwrapParentheses)
    : [type];

  const parts = members.filter(
    (member): member is ts.TypeLiteralNode | ts.TypeReferenceNode =>
      ts.isTypeLiteralNode(member) || ts.isTypeReferenceNode(member)
  );
  return parts.length === members.length ? parts : undefined;
};

export const isRecordDeclaration = (
  node: ts.Node
): node is RecordDeclaration =>
  ts.isInterfaceDeclaration(node) ||
  ts.isClassDeclaration(node) ||
  (ts.isTypeAliasDeclaration(node) && aliasParts(node) !== undefined);

const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node) ?? []).some((modifier) => modifier.kind === kind);

const isHidden = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.PrivateKeyword) ||
  hasModifier(node, ts.SyntaxKind.ProtectedKeyword);

/**
 * Text of a member name; computed names keep their source text and fail
 * identifier validation later
 */
const memberName = (name: ts.PropertyName | ts.BindingName): string =>
  ts.isIdentifier(name) ||
  ts.isPrivateIdentifier(name) ||
  ts.isStringLiteral(name) ||
  ts.isNoSubstitutionTemplateLiteral(name) ||
  ts.isNumericLiteral(name)
    ? name.text
    : name.getText();

const propertyField = (
  member: ts.PropertySignature | ts.PropertyDeclaration | ts.ParameterDeclaration
): RecordField => ({
  identifier: memberName(member.name),
  typeNode: member.type,
  metadata: readMetadata(member),
  isEmbedded: false,
  isExported: !isHidden(member) && !ts.isPrivateIdentifier(member.name),
  position: nodePosition(member),
});

const embeddedField = (
  node: ts.ExpressionWithTypeArguments | ts.TypeReferenceNode
): RecordField => {
  const nameNode = ts.isTypeReferenceNode(node) ? node.typeName : node.expression;
  const text = nameNode.getText();
  const lastDot = text.lastIndexOf(".");

  return {
    identifier: lastDot < 0 ? text : text.slice(lastDot + 1),
    typeNode: node,
    metadata: [],
    isEmbedded: true,
    isExported: true,
    position: nodePosition(node),
  };
};

const typeElementFields = (
  members: ts.NodeArray<ts.TypeElement>
): readonly RecordField[] =>
  members.filter(ts.isPropertySignature).map(propertyField);

const classMemberFields = (
  members: ts.NodeArray<ts.ClassElement>
): readonly RecordField[] =>
  members.flatMap((member): readonly RecordField[] => {
    if (ts.isConstructorDeclaration(member)) {
      return member.parameters
        .filter((parameter) => ts.isParameterPropertyDeclaration(parameter, member))
        .map(propertyField);
    }
    if (
      ts.isPropertyDeclaration(member) &&
      !hasModifier(member, ts.SyntaxKind.StaticKeyword)
    ) {
      return [propertyField(member)];
    }
    return [];
  });

const heritageFields = (
  clauses: ts.NodeArray<ts.HeritageClause> | undefined
): readonly RecordField[] =>
  (clauses ?? [])
    .filter((clause) => clause.token === ts.SyntaxKind.ExtendsKeyword)
    .flatMap((clause) => clause.types.map(embeddedField));

/**
 * Fields of a record in declaration order. Heritage entries come first,
 * as they do in the source text.
 */
export const listFields = (
  declaration: RecordDeclaration
): readonly RecordField[] => {
  if (ts.isInterfaceDeclaration(declaration)) {
    return [
      ...heritageFields(declaration.heritageClauses),
      ...typeElementFields(declaration.members),
    ];
  }

  if (ts.isClassDeclaration(declaration)) {
    return [
      ...heritageFields(declaration.heritageClauses),
      ...classMemberFields(declaration.members),
    ];
  }

  return (aliasParts(declaration) ?? []).flatMap((part) =>
    ts.isTypeLiteralNode(part)
      ? typeElementFields(part.members)
      : [embeddedField(part)]
  );
};

/**
 * Build a record from the declarations of one symbol. Interface
 * declarations merge; otherwise the first record declaration is used.
 */
export const recordFromDeclarations = (
  name: string,
  declarations: readonly ts.Declaration[]
): Result<RecordType> => {
  const records = declarations.filter(isRecordDeclaration);
  const [first] = records;
  if (!first) {
    const [declaration] = declarations;
    return error([
      errorDiagnostic(
        "FG3003",
        `Cannot use ${name}: only interfaces, classes and object type aliases are records`,
        declaration ? nodePosition(declaration) : undefined
      ),
    ]);
  }

  const merged = records.every(ts.isInterfaceDeclaration) ? records : [first];

  return ok({
    name,
    declaration: first,
    sourceFile: first.getSourceFile(),
    fields: merged.flatMap(listFields),
  });
};

/**
 * Find a record by name in a unit. A dotted name that is not found is
 * retried with everything after its first dot.
 */
export const findRecord = (
  unit: SourceUnit,
  recordName: string
): Result<RecordType> => {
  const dot = recordName.indexOf(".");
  const candidates = [
    recordName,
    ...(dot >= 0 ? [recordName.slice(dot + 1)] : []),
  ];

  for (const name of candidates) {
    const declarations = unit.symbols.get(name);
    if (!declarations) {
      continue;
    }

    const files = new Set(declarations.map((d) => d.getSourceFile().fileName));
    if (files.size > 1) {
      const diagnostic: Diagnostic = {
        ...errorDiagnostic(
          "FG3002",
          `Record ${name} is ambiguous in ${describeLocation(unit.location)}`
        ),
        hint: `Declared in ${[...files].sort().join(", ")}`,
      };
      return error([diagnostic]);
    }

    return recordFromDeclarations(name, declarations);
  }

  return error([
    errorDiagnostic(
      "FG3002",
      `Record ${recordName} not found in ${describeLocation(unit.location)}`
    ),
  ]);
};
