export { AnyDocument, DocumentsResults } from "./types";
export type { DocumentId, DocumentQuery, DocumentsQuery } from "./types";
