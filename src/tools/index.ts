export * from "./CsvTool";
export * from "./errors";
export * from "./ScrapeTool";
export * from "./StatsTool";
