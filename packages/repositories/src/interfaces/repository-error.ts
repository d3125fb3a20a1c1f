/**
 * Repository error types
 */
export type RepositoryError = { type: "DB_ERROR"; message: string };

export function toRepositoryError(error: unknown): RepositoryError {
  return {
    type: "DB_ERROR",
    message: error instanceof Error ? error.message : "Unknown error",
  };
}
