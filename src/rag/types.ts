export type Logger = (msg: string) => void;

export interface PageContent {
  pageNumber: number;
  text: string;
}

export interface ExtractedDocument {
  source: string;
  pageCount: number;
  pages: PageContent[];
}

export interface TextChunk {
  text: string;
  pageNumber: number;
  chunkIndex: number;
}

export interface IngestedDocument {
  filename: string;
  pageCount: number;
  chunks: TextChunk[];
}

export interface Chunk {
  id: string;
  text: string;
  sourceFilename: string;
  pageNumber: number;
  chunkIndex: number;
  embedding: number[];
}

export interface SearchHit {
  chunk: Chunk;
  /** Cosine similarity in [-1, 1]. */
  score: number;
}

export interface StoreStats {
  totalDocuments: number;
  sourceCount: number;
}

export interface PdfUpload {
  bytes: Uint8Array;
  filename: string;
}

export interface IngestionSuccess {
  status: "success";
  filename: string;
  pageCount: number;
  chunkCount: number;
}

export interface IngestionFailure {
  status: "error";
  filename: string;
  errorMessage: string;
}

export type IngestionResult = IngestionSuccess | IngestionFailure;

export interface IngestionBatchResult {
  results: IngestionResult[];
  success: IngestionSuccess[];
  errors: IngestionFailure[];
}

export type TurnRole = "user" | "assistant";

export interface RetrievedChunkRef {
  id: string;
  sourceFilename: string;
  pageNumber: number;
  chunkIndex: number;
  text: string;
  similarity: number;
}

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  /** ISO-8601 */
  timestamp: string;
  retrievedChunks?: RetrievedChunkRef[];
  isError: boolean;
}

export interface Conversation {
  id: string;
  createdAt: string;
  turns: ConversationTurn[];
}

export interface SimilarDocument {
  document: string;
  metadata: {
    id: string;
    filename: string;
    page: number;
    chunkIndex: number;
  };
  similarity: number;
}

export interface ChatResponse {
  response: string;
  similarDocuments: SimilarDocument[];
  error: boolean;
}

export interface RecentMessage {
  role: TurnRole;
  content: string;
}
