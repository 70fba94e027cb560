import { Project, ts, type ClassDeclaration, type SourceFile } from "ts-morph";

const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  strict: true,
  experimentalDecorators: true,
  skipLibCheck: true,
};

/**
 * Loads contract sources into a ts-morph project.
 * Sources are parsed only; imports are never resolved or type-checked.
 */
export class Parser {
  private project: Project;
  private useFileSystem: boolean;

  constructor(useFileSystem = false) {
    this.useFileSystem = useFileSystem;
    this.project = new Project({
      useInMemoryFileSystem: !useFileSystem,
      skipAddingFilesFromTsConfig: true,
      skipFileDependencyResolution: true,
      compilerOptions: COMPILER_OPTIONS,
    });
  }

  parse(source: string, fileName = "contract.ts"): SourceFile {
    return this.project.createSourceFile(fileName, source, { overwrite: true });
  }

  parseFile(filePath: string): SourceFile {
    if (!this.useFileSystem) {
      throw new Error("Parser must be initialized with useFileSystem=true to parse files");
    }
    return this.project.addSourceFileAtPath(filePath);
  }

  getContracts(sourceFile: SourceFile): ClassDeclaration[] {
    return sourceFile.getClasses().filter((c) => c.isExported());
  }
}
