import {
  Node,
  Scope,
  SyntaxKind,
  type ClassDeclaration,
  type MethodDeclaration,
  type ParameterDeclaration,
  type PropertyDeclaration,
  type SourceFile,
} from "ts-morph";
import type { Hex } from "viem";
import { mapType, type EvmType, type EvmValue } from "../evm/types.js";
import { computeSelector } from "../evm/abi.js";

export interface StorageVariable {
  name: string;
  type: EvmType;
  slot: bigint;
  defaultValue?: EvmValue;
}

export interface Parameter {
  name: string;
  type: EvmType;
}

export type Mutability = "pure" | "view" | "nonpayable" | "payable";

export interface FunctionInfo {
  name: string;
  /** "0x" for the constructor and non-public functions */
  selector: Hex;
  params: Parameter[];
  returnType: EvmType | null;
  visibility: "public" | "private";
  mutability: Mutability;
  isConstructor: boolean;
}

export interface ContractInfo {
  name: string;
  storage: StorageVariable[];
  functions: FunctionInfo[];
  constructor: FunctionInfo | null;
}

export class Analyzer {
  /**
   * Analyze source file and extract contract information
   */
  analyze(sourceFile: SourceFile): ContractInfo[] {
    const classes = sourceFile.getClasses().filter((c) => c.isExported());
    return classes.map((c) => this.analyzeClass(c));
  }

  private analyzeClass(classDecl: ClassDeclaration): ContractInfo {
    const name = classDecl.getName() ?? "Contract";

    const storage = this.analyzeStorage(classDecl);
    const functions = this.analyzeFunctions(classDecl);
    const ctor = functions.find((f) => f.isConstructor) ?? null;

    return {
      name,
      storage,
      functions: functions.filter((f) => !f.isConstructor),
      constructor: ctor,
    };
  }

  /**
   * Assign slots to @storage fields in declaration order.
   * @slot(n) pins a field without advancing the automatic counter,
   * and automatic assignment skips pinned slots.
   */
  private analyzeStorage(classDecl: ClassDeclaration): StorageVariable[] {
    const props = classDecl.getProperties().filter((prop) => this.hasDecorator(prop, "storage"));

    const explicitSlots = new Map<bigint, string>();
    for (const prop of props) {
      const explicitSlot = this.getExplicitSlot(prop);
      if (explicitSlot === undefined) continue;
      const owner = explicitSlots.get(explicitSlot);
      if (owner !== undefined) {
        throw new Error(
          `Slot ${explicitSlot} is assigned to both "${owner}" and "${prop.getName()}". ` +
            `Each @slot must specify a unique slot number.`
        );
      }
      explicitSlots.set(explicitSlot, prop.getName());
    }

    let nextSlot = 0n;
    return props.map((prop) => {
      let slot = this.getExplicitSlot(prop);
      if (slot === undefined) {
        while (explicitSlots.has(nextSlot)) nextSlot++;
        slot = nextSlot++;
      }

      const storageVar: StorageVariable = {
        name: prop.getName(),
        type: mapType(prop.getTypeNode()?.getText() ?? "u256"),
        slot,
      };
      const defaultValue = this.extractDefaultValue(prop);
      if (defaultValue !== undefined) {
        storageVar.defaultValue = defaultValue;
      }
      return storageVar;
    });
  }

  /**
   * Extract explicit slot number from @slot decorator if present
   */
  private getExplicitSlot(prop: PropertyDeclaration): bigint | undefined {
    const slotDecorator = prop.getDecorator("slot");
    const arg = slotDecorator?.getArguments()[0];
    if (!arg) return undefined;

    const text = arg.getText().replace(/_/g, "");
    const literal = text.endsWith("n") ? text.slice(0, -1) : text;
    if (!/^(0x[0-9a-fA-F]+|\d+)$/.test(literal)) {
      throw new Error(`@slot on "${prop.getName()}" needs an integer literal, got ${arg.getText()}`);
    }
    return BigInt(literal);
  }

  private extractDefaultValue(prop: PropertyDeclaration): EvmValue | undefined {
    const initializer = prop.getInitializer();
    if (!initializer) return undefined;

    if (Node.isTrueLiteral(initializer)) return true;
    if (Node.isFalseLiteral(initializer)) return false;

    const literal = this.literalValue(prop, initializer);
    if (literal !== undefined) return literal;

    // Handle negative numbers: e.g., -887272n
    if (
      Node.isPrefixUnaryExpression(initializer) &&
      initializer.getOperatorToken() === SyntaxKind.MinusToken
    ) {
      const operand = this.literalValue(prop, initializer.getOperand());
      return operand === undefined ? undefined : -operand;
    }

    return undefined;
  }

  private literalValue(prop: PropertyDeclaration, node: Node): bigint | undefined {
    // BigInt literal: e.g., 3000n
    if (Node.isBigIntLiteral(node)) {
      return BigInt(node.getText().replace(/_/g, "").slice(0, -1));
    }
    if (Node.isNumericLiteral(node)) {
      const value = node.getLiteralValue();
      if (!Number.isSafeInteger(value)) {
        throw new Error(
          `Default of "${prop.getName()}" needs an integer literal, got ${node.getText()}`
        );
      }
      return BigInt(value);
    }
    return undefined;
  }

  private hasDecorator(node: PropertyDeclaration | MethodDeclaration, name: string): boolean {
    return node.getDecorators().some((d) => d.getName() === name);
  }

  private analyzeFunctions(classDecl: ClassDeclaration): FunctionInfo[] {
    const functions: FunctionInfo[] = [];

    const ctor = classDecl.getConstructors()[0];
    if (ctor) {
      functions.push({
        name: "constructor",
        selector: "0x",
        params: this.analyzeParams(ctor.getParameters()),
        returnType: null,
        visibility: "public",
        mutability: "nonpayable",
        isConstructor: true,
      });
    }

    for (const method of classDecl.getMethods()) {
      if (method.isStatic()) continue;

      const name = method.getName();
      const isPublic = !this.hasDecorator(method, "internal") && method.getScope() !== Scope.Private;
      const params = this.analyzeParams(method.getParameters());

      functions.push({
        name,
        selector: isPublic ? computeSelector(name, params) : "0x",
        params,
        returnType: this.analyzeReturnType(method),
        visibility: isPublic ? "public" : "private",
        mutability: this.analyzeMutability(method),
        isConstructor: false,
      });
    }

    return functions;
  }

  private analyzeParams(params: ParameterDeclaration[]): Parameter[] {
    return params
      .filter((p) => p.getName() !== "this")
      .map((p) => ({
        name: p.getName(),
        type: mapType(p.getTypeNode()?.getText() ?? "u256"),
      }));
  }

  private analyzeReturnType(method: MethodDeclaration): EvmType | null {
    const typeName = method.getReturnTypeNode()?.getText();
    if (typeName === undefined || typeName === "void") return null;
    return mapType(typeName);
  }

  private analyzeMutability(method: MethodDeclaration): Mutability {
    const mutabilities = ["payable", "view", "pure"] as const;
    return mutabilities.find((m) => this.hasDecorator(method, m)) ?? "nonpayable";
  }
}
