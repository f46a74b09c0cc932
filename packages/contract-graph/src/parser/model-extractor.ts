/**
 * Model Extractor - infers data-model shapes from TypeScript/JavaScript
 * source with a pure syntax-tree walk. Source is parsed, never executed.
 *
 * A class qualifies when it extends one of the configured marker names,
 * directly or through another qualifying class declared in the same file.
 * Each qualifying class becomes a pseudo-endpoint `SCHEMA <module>.<Class>`
 * whose `model` response holds the class fields.
 */

import ts from "typescript";
import {
  type Endpoint,
  MODEL_METHOD,
  MODEL_RESPONSE_KEY,
} from "../graph/contract.js";
import { UnparsableSourceError } from "../errors.js";
import {
  arrayNode,
  cycleMarker,
  type EnumValue,
  objectNode,
  primitive,
  type PrimitiveType,
  type SchemaNode,
  unionNode,
  unknownNode,
  withMeta,
} from "../schema/schema-node.js";

export const DEFAULT_MODEL_MARKERS: readonly string[] = ["BaseModel"];

export interface ExtractOptions {
  /** Path of the file relative to the repository root, e.g. `src/models/user.ts` */
  fileName: string;
  /** Base-class names that mark a declaration as a model */
  markers?: readonly string[];
}

const ARRAY_TYPES = new Set(["Array", "ReadonlyArray", "Set", "ReadonlySet"]);
const MAP_TYPES = new Set(["Record", "Map", "ReadonlyMap", "WeakMap"]);
const OPTIONAL_DECORATORS = new Set(["IsOptional"]);

/**
 * `src/models/user.ts` becomes `src.models.user`
 */
export function modulePathOf(fileName: string): string {
  return fileName
    .replace(/\\/g, "/")
    .replace(/^\.\//, "")
    .replace(/\.(d\.)?[cm]?[jt]sx?$/, "")
    .split("/")
    .filter((segment) => segment.length > 0)
    .join(".");
}

function scriptKindOf(fileName: string): ts.ScriptKind {
  if (/\.tsx$/i.test(fileName)) return ts.ScriptKind.TSX;
  if (/\.jsx$/i.test(fileName)) return ts.ScriptKind.JSX;
  if (/\.[cm]?js$/i.test(fileName)) return ts.ScriptKind.JS;
  return ts.ScriptKind.TS;
}

/**
 * Fail on the first syntactic error of the file
 */
function assertParsable(sourceText: string, fileName: string): void {
  const { diagnostics = [] } = ts.transpileModule(sourceText, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: { allowJs: true, jsx: ts.JsxEmit.Preserve },
  });
  const error = diagnostics.find((d) => d.category === ts.DiagnosticCategory.Error);
  if (!error) return;

  const line =
    error.file && error.start !== undefined
      ? error.file.getLineAndCharacterOfPosition(error.start).line + 1
      : undefined;
  throw new UnparsableSourceError({
    message: `${fileName}${line !== undefined ? `:${line}` : ""}: ${ts.flattenDiagnosticMessageText(error.messageText, "\n")}`,
    file: fileName,
    ...(line !== undefined && { line }),
  });
}

function jsDocText(node: ts.Node): string | undefined {
  for (const doc of ts.getJSDocCommentsAndTags(node)) {
    if (!ts.isJSDoc(doc)) continue;
    const text = ts.getTextOfJSDocComment(doc.comment)?.trim();
    if (text) return text;
  }
  return undefined;
}

function memberName(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return undefined;
}

function entityName(name: ts.EntityName | ts.Expression): string | undefined {
  if (ts.isIdentifier(name)) return name.text;
  if (ts.isQualifiedName(name)) return name.right.text;
  if (ts.isPropertyAccessExpression(name)) return name.name.text;
  return undefined;
}

function baseClassName(declaration: ts.ClassDeclaration): string | undefined {
  for (const clause of declaration.heritageClauses ?? []) {
    if (clause.token !== ts.SyntaxKind.ExtendsKeyword) continue;
    const [base] = clause.types;
    return base ? entityName(base.expression) : undefined;
  }
  return undefined;
}

function hasModifier(node: ts.HasModifiers, kind: ts.SyntaxKind): boolean {
  return (ts.getModifiers(node) ?? []).some((modifier) => modifier.kind === kind);
}

function hasOptionalDecorator(node: ts.PropertyDeclaration): boolean {
  return (ts.getDecorators(node) ?? []).some((decorator) => {
    const expression = ts.isCallExpression(decorator.expression)
      ? decorator.expression.expression
      : decorator.expression;
    const name = entityName(expression);
    return name !== undefined && OPTIONAL_DECORATORS.has(name);
  });
}

function literalValue(node: ts.TypeNode): { type: PrimitiveType; value: EnumValue } | undefined {
  if (!ts.isLiteralTypeNode(node)) return undefined;
  const literal = node.literal;
  if (ts.isStringLiteral(literal) || ts.isNoSubstitutionTemplateLiteral(literal)) {
    return { type: "string", value: literal.text };
  }
  if (ts.isNumericLiteral(literal)) {
    return { type: "number", value: Number(literal.text) };
  }
  if (
    ts.isPrefixUnaryExpression(literal) &&
    literal.operator === ts.SyntaxKind.MinusToken &&
    ts.isNumericLiteral(literal.operand)
  ) {
    return { type: "number", value: -Number(literal.operand.text) };
  }
  if (literal.kind === ts.SyntaxKind.TrueKeyword) return { type: "boolean", value: true };
  if (literal.kind === ts.SyntaxKind.FalseKeyword) return { type: "boolean", value: false };
  return undefined;
}

function isNullish(node: ts.TypeNode): boolean {
  return (
    node.kind === ts.SyntaxKind.UndefinedKeyword ||
    node.kind === ts.SyntaxKind.VoidKeyword ||
    (ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword)
  );
}

interface Fields {
  properties: Record<string, SchemaNode>;
  required: string[];
}

class ModelWalker {
  private readonly classes = new Map<string, ts.ClassDeclaration>();
  private readonly modulePath: string;

  constructor(
    private readonly sourceFile: ts.SourceFile,
    private readonly markers: ReadonlySet<string>,
    fileName: string,
  ) {
    this.modulePath = modulePathOf(fileName);
    const collect = (node: ts.Node): void => {
      if (ts.isClassDeclaration(node) && node.name) {
        this.classes.set(node.name.text, node);
      }
      ts.forEachChild(node, collect);
    };
    collect(sourceFile);
  }

  models(): Endpoint[] {
    const endpoints: Endpoint[] = [];
    for (const [name, declaration] of this.classes) {
      if (!this.qualifies(name, new Set())) continue;
      const { properties, required } = this.fields(declaration, new Set([name]));
      const summary = jsDocText(declaration)?.split("\n")[0].trim() || undefined;
      endpoints.push({
        method: MODEL_METHOD,
        path: this.qualifiedName(name),
        ...(summary !== undefined && { summary }),
        responses: { [MODEL_RESPONSE_KEY]: objectNode(properties, required) },
      });
    }
    return endpoints;
  }

  private qualifiedName(className: string): string {
    return this.modulePath ? `${this.modulePath}.${className}` : className;
  }

  private qualifies(name: string, visiting: Set<string>): boolean {
    const declaration = this.classes.get(name);
    if (!declaration || visiting.has(name)) return false;
    const base = baseClassName(declaration);
    if (base === undefined) return false;
    if (this.markers.has(base)) return true;
    visiting.add(name);
    return this.qualifies(base, visiting);
  }

  /**
   * Inherited fields first, then the class's own declarations
   */
  private fields(declaration: ts.ClassDeclaration, expanding: ReadonlySet<string>): Fields {
    const inherited: Fields = { properties: {}, required: [] };
    const base = baseClassName(declaration);
    if (base !== undefined && !this.markers.has(base) && this.classes.has(base)) {
      const baseDeclaration = this.classes.get(base);
      if (baseDeclaration && !expanding.has(base) && this.qualifies(base, new Set())) {
        Object.assign(inherited, this.fields(baseDeclaration, new Set([...expanding, base])));
      }
    }

    const properties: Record<string, SchemaNode> = { ...inherited.properties };
    const required = new Set(inherited.required);

    for (const member of declaration.members) {
      if (!ts.isPropertyDeclaration(member)) continue;
      if (
        hasModifier(member, ts.SyntaxKind.StaticKeyword) ||
        hasModifier(member, ts.SyntaxKind.PrivateKeyword) ||
        hasModifier(member, ts.SyntaxKind.ProtectedKeyword)
      ) {
        continue;
      }
      const name = memberName(member.name);
      if (name === undefined) continue;

      const description = jsDocText(member);
      const mapped = member.type
        ? this.mapType(member.type, expanding)
        : unknownNode({ nullable: true });
      properties[name] = description ? withMeta(mapped, { description }) : mapped;

      const optional =
        member.questionToken !== undefined ||
        member.initializer !== undefined ||
        hasOptionalDecorator(member);
      if (optional) required.delete(name);
      else required.add(name);
    }

    return { properties, required: [...required] };
  }

  private mapType(node: ts.TypeNode, expanding: ReadonlySet<string>): SchemaNode {
    switch (node.kind) {
      case ts.SyntaxKind.StringKeyword:
        return primitive("string");
      case ts.SyntaxKind.NumberKeyword:
        return primitive("number");
      case ts.SyntaxKind.BigIntKeyword:
        return primitive("integer");
      case ts.SyntaxKind.BooleanKeyword:
        return primitive("boolean");
      case ts.SyntaxKind.UndefinedKeyword:
      case ts.SyntaxKind.VoidKeyword:
        return primitive("null");
      case ts.SyntaxKind.AnyKeyword:
      case ts.SyntaxKind.UnknownKeyword:
      case ts.SyntaxKind.ObjectKeyword:
        return unknownNode();
      default:
        break;
    }

    if (ts.isParenthesizedTypeNode(node)) return this.mapType(node.type, expanding);
    if (ts.isTypeOperatorNode(node) && node.operator === ts.SyntaxKind.ReadonlyKeyword) {
      return this.mapType(node.type, expanding);
    }
    if (ts.isArrayTypeNode(node)) return arrayNode(this.mapType(node.elementType, expanding));
    if (ts.isUnionTypeNode(node)) return this.mapUnion(node.types, expanding);
    if (ts.isTypeLiteralNode(node)) return this.mapTypeLiteral(node, expanding);

    if (ts.isLiteralTypeNode(node)) {
      if (node.literal.kind === ts.SyntaxKind.NullKeyword) return primitive("null");
      const literal = literalValue(node);
      return literal ? primitive(literal.type, { enum: [literal.value] }) : unknownNode();
    }

    if (ts.isTypeReferenceNode(node)) {
      return this.mapReference(node, expanding);
    }

    return unknownNode();
  }

  private mapReference(node: ts.TypeReferenceNode, expanding: ReadonlySet<string>): SchemaNode {
    const name = entityName(node.typeName) ?? node.typeName.getText(this.sourceFile);
    const [firstArgument] = node.typeArguments ?? [];

    if (ARRAY_TYPES.has(name)) {
      return arrayNode(firstArgument ? this.mapType(firstArgument, expanding) : unknownNode());
    }
    if (MAP_TYPES.has(name)) {
      return objectNode({});
    }
    if (name === "Date") {
      return primitive("string", { format: "date-time" });
    }

    const declaration = this.classes.get(name);
    if (declaration && this.qualifies(name, new Set())) {
      if (expanding.has(name)) {
        return cycleMarker(this.qualifiedName(name));
      }
      const { properties, required } = this.fields(declaration, new Set([...expanding, name]));
      return objectNode(properties, required);
    }

    return unknownNode({ format: name });
  }

  private mapUnion(members: readonly ts.TypeNode[], expanding: ReadonlySet<string>): SchemaNode {
    const concrete = members.filter((member) => !isNullish(member));
    const nullable = concrete.length < members.length;

    if (concrete.length === 0) return primitive("null");

    const literals = concrete.map(literalValue);
    const firstLiteral = literals[0];
    if (
      firstLiteral !== undefined &&
      literals.every((literal) => literal !== undefined && literal.type === firstLiteral.type)
    ) {
      const values = literals.flatMap((literal) => (literal ? [literal.value] : []));
      return primitive(firstLiteral.type, { nullable, enum: values });
    }

    if (concrete.length === 1) {
      const single = this.mapType(concrete[0], expanding);
      return nullable ? withMeta(single, { nullable: true }) : single;
    }
    return unionNode(
      "anyOf",
      concrete.map((member) => this.mapType(member, expanding)),
      { nullable },
    );
  }

  private mapTypeLiteral(node: ts.TypeLiteralNode, expanding: ReadonlySet<string>): SchemaNode {
    const properties: Record<string, SchemaNode> = {};
    const required: string[] = [];
    for (const member of node.members) {
      if (!ts.isPropertySignature(member)) continue;
      const name = memberName(member.name);
      if (name === undefined) continue;
      properties[name] = member.type
        ? this.mapType(member.type, expanding)
        : unknownNode({ nullable: true });
      if (!member.questionToken) required.push(name);
    }
    return objectNode(properties, required);
  }
}

/**
 * Extract one endpoint-shaped model per qualifying class.
 *
 * @throws UnparsableSourceError when the file has a syntax error
 */
export function extractModels(sourceText: string, options: ExtractOptions): Endpoint[] {
  const { fileName } = options;
  assertParsable(sourceText, fileName);

  const sourceFile = ts.createSourceFile(
    fileName,
    sourceText,
    ts.ScriptTarget.Latest,
    true,
    scriptKindOf(fileName),
  );
  const markers = new Set(options.markers ?? DEFAULT_MODEL_MARKERS);
  return new ModelWalker(sourceFile, markers, fileName).models();
}
