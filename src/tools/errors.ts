class ToolError extends Error {
  constructor(
    message: string,
    public readonly toolName: string,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Raised when legacy discovery finds no package directories on any index path.
 */
class NoPackagesFoundError extends ToolError {
  constructor(public readonly baseUrl: string) {
    super(`No packages found under ${baseUrl}`, "ScrapeTool");
  }
}

export { NoPackagesFoundError, ToolError };
