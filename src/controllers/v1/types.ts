import type { Response } from "express";
import { z } from "zod";
import type { ErrorCodes } from "../../lib/error";
import type { Answer, Document } from "../../lib/rag/types";
import type { IndexStats } from "../../lib/rag/vector-index";
import type { DedupEntry } from "../../services/dedup/claim-store";

export type ErrorResponse = {
  success: false;
  code?: ErrorCodes;
  error: string;
  details?: unknown;
};

export interface ResponseWithSentry<ResBody = undefined>
  extends Response<ResBody> {
  sentry?: string;
}

export const queryRequestSchema = z.strictObject({
  question: z.string().trim().min(1, "question must not be empty").max(4000),
});

export type QueryRequest = z.input<typeof queryRequestSchema>;

export type QueryResponse =
  | ErrorResponse
  | {
      success: true;
      data: Answer;
    };

export type DocumentStatusResponse =
  | ErrorResponse
  | {
      success: true;
      data: Document;
    };

export type SlackEventsResponse =
  | ErrorResponse
  | { challenge: string }
  | { ok: true; result: "accepted" | "duplicate" | "ignored" };

export type EventClaimResponse =
  | ErrorResponse
  | {
      success: true;
      data: DedupEntry;
    }
  | {
      success: true;
      removed: boolean;
    };

export type IndexStatsResponse =
  | ErrorResponse
  | {
      success: true;
      data: IndexStats;
    };

export type PurgeDocumentResponse =
  | ErrorResponse
  | {
      success: true;
      deleted: number;
    };
