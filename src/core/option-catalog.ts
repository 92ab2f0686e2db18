import type { OptionDefinition } from "./registry"

// Declaration order is the order options appear in generated invocations.
export const builtinOptionDefinitions: ReadonlyArray<OptionDefinition> = [
  { name: "dry-run", kind: "flag", modes: "both", description: "Print the build steps without running them" },
  {
    name: "jobs",
    kind: "value",
    valueType: "integer",
    minimum: 1,
    modes: "both",
    description: "Number of parallel build jobs",
  },
  { name: "clean", kind: "flag", modes: "both", description: "Remove previous build artifacts first" },
  { name: "verbose", kind: "flag", modes: "both", description: "Print debug output" },
  {
    name: "repository",
    kind: "value",
    valueType: "string",
    modes: "both",
    description: "Name of the repository directory to build",
  },
  { name: "debug", kind: "flag", modes: "both", description: "Build with debug information" },
  { name: "test", kind: "flag", modes: "both", description: "Build and run the tests" },
  { name: "benchmark", kind: "flag", modes: "both", description: "Build the benchmarks" },
  { name: "ninja", kind: "flag", modes: "both", description: "Generate Ninja build files" },
  {
    name: "build-variant",
    kind: "value",
    valueType: "string",
    choices: ["Debug", "Release", "RelWithDebInfo", "MinSizeRel"],
    defaultValue: "Debug",
    modes: "both",
    description: "CMake build type",
  },
  {
    name: "compiler-toolchain",
    kind: "value",
    valueType: "string",
    choices: ["clang", "gcc", "msvc"],
    defaultValue: "clang",
    modes: "both",
    description: "Compiler toolchain to build with",
  },
  {
    name: "host-target",
    kind: "value",
    valueType: "string",
    modes: "both",
    description: "Target triple of the build host",
  },
  {
    name: "install-prefix",
    kind: "value",
    valueType: "string",
    modes: "both",
    description: "Directory the build products are installed into",
  },
  {
    name: "auth-token",
    kind: "value",
    valueType: "string",
    modes: "configure",
    description: "Token used to download dependencies",
  },
  {
    name: "auth-token-file",
    kind: "value",
    valueType: "string",
    modes: "configure",
    description: "File containing the token used to download dependencies",
  },
  {
    name: "cmake-version",
    kind: "value",
    valueType: "string",
    modes: "configure",
    description: "Version of CMake to install as a local tool",
  },
  { name: "developer-build", kind: "flag", modes: "compose", description: "Build with developer diagnostics" },
  { name: "coverage", kind: "flag", modes: "compose", description: "Instrument the build for code coverage" },
  { name: "docs", kind: "flag", modes: "compose", description: "Generate the documentation" },
  { name: "static-libraries", kind: "flag", modes: "compose", description: "Link libraries statically" },
]
