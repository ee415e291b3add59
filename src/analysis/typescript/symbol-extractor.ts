/**
 * TypeScript Symbol Extractor
 *
 * Reads the top-level declarations of one source file into analyzed symbols,
 * using the type checker for signatures and documentation comments.
 *
 * @module
 */

import * as ts from "typescript";
import * as path from "node:path";
import type {
  AnalyzedSymbol,
  AnalyzedSymbolKind,
  MessageCollector,
} from "../../core/interfaces/IAnalysisEnvironment.js";
import type { SourceLocation, Visibility } from "../../core/model/documentable.js";
import { sampleReferences } from "./samples.js";

// =============================================================================
// Helpers
// =============================================================================

function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  return ts.canHaveModifiers(node) && (ts.getModifiers(node) ?? []).some((modifier) => modifier.kind === kind);
}

function memberVisibility(node: ts.ClassElement | ts.TypeElement): Visibility {
  if (node.name && ts.isPrivateIdentifier(node.name)) return "private";
  if (hasModifier(node, ts.SyntaxKind.PrivateKeyword)) return "private";
  if (hasModifier(node, ts.SyntaxKind.ProtectedKeyword)) return "protected";
  return "public";
}

/** Exported top-level declarations are public, the rest internal */
function topLevelVisibility(node: ts.Node): Visibility {
  return hasModifier(node, ts.SyntaxKind.ExportKeyword) ? "public" : "internal";
}

function isDeprecated(node: ts.Node): boolean {
  return ts.getJSDocTags(node).some((tag) => tag.tagName.text === "deprecated");
}

function annotationsOf(node: ts.Node, sourceFile: ts.SourceFile): string[] {
  if (!ts.canHaveDecorators(node)) return [];
  return (ts.getDecorators(node) ?? []).map((decorator) => decorator.getText(sourceFile));
}

function nameOf(name: ts.PropertyName | ts.BindingName | undefined, sourceFile: ts.SourceFile): string | undefined {
  if (!name) return undefined;
  if (ts.isIdentifier(name) || ts.isPrivateIdentifier(name) || ts.isStringLiteral(name) || ts.isNumericLiteral(name)) {
    return name.text;
  }
  return name.getText(sourceFile);
}

// =============================================================================
// Extractor
// =============================================================================

export class SymbolExtractor {
  /**
   * @param samples - Sample code by name, for `@sample` tags
   * @param collector - Receives a warning for every unresolved sample
   */
  constructor(
    private readonly checker: ts.TypeChecker,
    private readonly samples: ReadonlyMap<string, string> = new Map(),
    private readonly collector?: MessageCollector
  ) {}

  /**
   * Top-level declarations of a file, in source order
   */
  extract(sourceFile: ts.SourceFile): AnalyzedSymbol[] {
    return sourceFile.statements.flatMap((statement) => this.fromStatement(statement, sourceFile));
  }

  private fromStatement(statement: ts.Statement, sourceFile: ts.SourceFile): AnalyzedSymbol[] {
    const visibility = topLevelVisibility(statement);

    if (ts.isClassDeclaration(statement) && statement.name) {
      return [
        this.symbol(statement, sourceFile, "class", statement.name.text, visibility, {
          signature: this.classlikeSignature(statement, sourceFile),
          documentedBy: statement.name,
          members: statement.members.flatMap((member) => this.fromClassElement(member, sourceFile)),
        }),
      ];
    }
    if (ts.isInterfaceDeclaration(statement)) {
      return [
        this.symbol(statement, sourceFile, "interface", statement.name.text, visibility, {
          signature: this.classlikeSignature(statement, sourceFile),
          documentedBy: statement.name,
          members: statement.members.flatMap((member) => this.fromTypeElement(member, sourceFile)),
        }),
      ];
    }
    if (ts.isEnumDeclaration(statement)) {
      return [
        this.symbol(statement, sourceFile, "enum", statement.name.text, visibility, {
          documentedBy: statement.name,
          members: statement.members.map((member) =>
            this.symbol(member, sourceFile, "enumEntry", nameOf(member.name, sourceFile) ?? "", "public", {
              documentedBy: member.name,
            })
          ),
        }),
      ];
    }
    if (ts.isModuleDeclaration(statement) && ts.isIdentifier(statement.name)) {
      const body = statement.body && ts.isModuleBlock(statement.body) ? statement.body.statements : [];
      return [
        this.symbol(statement, sourceFile, "object", statement.name.text, visibility, {
          documentedBy: statement.name,
          members: body.flatMap((inner) => this.fromStatement(inner, sourceFile)),
        }),
      ];
    }
    if (ts.isFunctionDeclaration(statement) && statement.name) {
      if (this.isOverloadImplementation(statement)) return [];
      return [
        this.callable(statement, sourceFile, "function", statement.name.text, visibility),
      ];
    }
    if (ts.isTypeAliasDeclaration(statement)) {
      return [
        this.symbol(statement, sourceFile, "typeAlias", statement.name.text, visibility, {
          signature: `${statement.typeParameters ? this.typeParameters(statement.typeParameters, sourceFile) : ""} = ${statement.type.getText(sourceFile)}`,
          documentedBy: statement.name,
        }),
      ];
    }
    if (ts.isVariableStatement(statement)) {
      return statement.declarationList.declarations.flatMap((declaration) => {
        const name = nameOf(declaration.name, sourceFile);
        if (!name) return [];
        // Documentation and modifiers sit on the statement
        return [
          this.symbol(statement, sourceFile, "property", name, visibility, {
            signature: this.typeSignature(declaration),
            documentedBy: declaration.name,
          }),
        ];
      });
    }
    return [];
  }

  private fromClassElement(member: ts.ClassElement, sourceFile: ts.SourceFile): AnalyzedSymbol[] {
    const visibility = memberVisibility(member);
    if (ts.isConstructorDeclaration(member)) {
      if (this.isOverloadImplementation(member)) return [];
      return [this.callable(member, sourceFile, "constructor", "constructor", visibility)];
    }
    const name = nameOf(member.name, sourceFile);
    if (!name) return [];
    if (ts.isMethodDeclaration(member)) {
      if (this.isOverloadImplementation(member)) return [];
      return [this.callable(member, sourceFile, "function", name, visibility)];
    }
    if (ts.isPropertyDeclaration(member) || ts.isGetAccessorDeclaration(member)) {
      return [
        this.symbol(member, sourceFile, "property", name, visibility, {
          signature: this.typeSignature(member),
          documentedBy: member.name,
        }),
      ];
    }
    return [];
  }

  private fromTypeElement(member: ts.TypeElement, sourceFile: ts.SourceFile): AnalyzedSymbol[] {
    const name = nameOf(member.name, sourceFile);
    if (!name) return [];
    if (ts.isMethodSignature(member)) {
      return [this.callable(member, sourceFile, "function", name, "public")];
    }
    if (ts.isPropertySignature(member)) {
      return [
        this.symbol(member, sourceFile, "property", name, "public", {
          signature: this.typeSignature(member),
          documentedBy: member.name,
        }),
      ];
    }
    return [];
  }

  private symbol(
    node: ts.Node,
    sourceFile: ts.SourceFile,
    kind: AnalyzedSymbolKind,
    name: string,
    visibility: Visibility,
    details: { signature?: string; members?: AnalyzedSymbol[]; documentedBy?: ts.Node; documentation?: string }
  ): AnalyzedSymbol {
    const start = sourceFile.getLineAndCharacterOfPosition(node.getStart(sourceFile));
    const location: SourceLocation = {
      path: path.resolve(sourceFile.fileName),
      line: start.line + 1,
      column: start.character + 1,
    };
    const samples = this.resolveSamples(node, location);
    return {
      kind,
      name,
      signature: details.signature,
      documentation: details.documentation ?? (details.documentedBy ? this.documentation(details.documentedBy) : undefined),
      visibility,
      deprecated: isDeprecated(node),
      annotations: annotationsOf(node, sourceFile),
      location,
      members: details.members ?? [],
      ...(samples.length > 0 ? { samples } : {}),
    };
  }

  private resolveSamples(node: ts.Node, location: SourceLocation): string[] {
    return sampleReferences(node).flatMap((name) => {
      const code = this.samples.get(name);
      if (code === undefined) {
        this.collector?.report("warning", `Unresolved sample ${name}`, location);
        return [];
      }
      return [code];
    });
  }

  /**
   * Documentation of the symbol named by `name`
   */
  private documentation(name: ts.Node): string | undefined {
    const symbol = this.checker.getSymbolAtLocation(name);
    if (!symbol) return undefined;
    return ts.displayPartsToString(symbol.getDocumentationComment(this.checker)).trim() || undefined;
  }

  /**
   * Functions, methods and constructors. Each overload is its own symbol with
   * its own signature and documentation.
   */
  private callable(
    node: ts.SignatureDeclaration,
    sourceFile: ts.SourceFile,
    kind: AnalyzedSymbolKind,
    name: string,
    visibility: Visibility
  ): AnalyzedSymbol {
    const signature = this.checker.getSignatureFromDeclaration(node);
    const documentation = signature
      ? ts.displayPartsToString(signature.getDocumentationComment(this.checker)).trim()
      : "";
    return this.symbol(node, sourceFile, kind, name, visibility, {
      signature: signature ? this.checker.signatureToString(signature, node) : undefined,
      documentation: documentation || undefined,
    });
  }

  private typeSignature(node: ts.Declaration): string {
    const type = this.checker.getTypeAtLocation(node);
    return `: ${this.checker.typeToString(type, node)}`;
  }

  private typeParameters(
    parameters: ts.NodeArray<ts.TypeParameterDeclaration>,
    sourceFile: ts.SourceFile
  ): string {
    return `<${parameters.map((parameter) => parameter.getText(sourceFile)).join(", ")}>`;
  }

  private classlikeSignature(
    node: ts.ClassDeclaration | ts.InterfaceDeclaration,
    sourceFile: ts.SourceFile
  ): string | undefined {
    const typeParameters = node.typeParameters ? this.typeParameters(node.typeParameters, sourceFile) : "";
    const heritage = (node.heritageClauses ?? []).map((clause) => clause.getText(sourceFile)).join(" ");
    const signature = heritage ? `${typeParameters} ${heritage}` : typeParameters;
    return signature || undefined;
  }

  /**
   * The body-carrying declaration of an overloaded function; its overload
   * signatures are documented instead
   */
  private isOverloadImplementation(node: ts.FunctionLikeDeclaration): boolean {
    if (!node.body) return false;
    if (ts.isConstructorDeclaration(node)) {
      return node.parent.members.filter(ts.isConstructorDeclaration).length > 1;
    }
    const symbol = node.name ? this.checker.getSymbolAtLocation(node.name) : undefined;
    return (symbol?.declarations ?? []).some(
      (declaration) => declaration !== node && ts.isFunctionLike(declaration) && declaration.kind === node.kind
    );
  }
}
