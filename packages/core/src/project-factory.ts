import { Project, ts, type ProjectOptions } from 'ts-morph';

/**
 * Parse-only projects: in-memory file system, no lib files, no dependency
 * resolution. Programs built from them only ever produce syntactic output.
 */
const SOURCE_PROJECT_OPTIONS: ProjectOptions = {
  useInMemoryFileSystem: true,
  skipAddingFilesFromTsConfig: true,
  skipFileDependencyResolution: true,
  skipLoadingLibFiles: true,
  compilerOptions: {
    allowJs: true,
    jsx: ts.JsxEmit.Preserve,
    noLib: true,
    noResolve: true,
  },
};

function mergeOptions(base: ProjectOptions, overrides?: ProjectOptions): ProjectOptions {
  const { compilerOptions: overrideCompiler, ...rest } = overrides ?? {};
  return {
    ...base,
    ...rest,
    compilerOptions: {
      ...(base.compilerOptions ?? {}),
      ...(overrideCompiler ?? {}),
    },
  };
}

export function createSourceProject(overrides?: ProjectOptions): Project {
  return new Project(mergeOptions(SOURCE_PROJECT_OPTIONS, overrides));
}
