export * from "./sentiment";
export type { PostSource, TextAnalyzer } from "./collaborators";
