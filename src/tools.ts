import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { APP_VERSION } from "./config";
import { InvalidArgumentError, RagError } from "./errors";
import { markdownToText } from "./ingest/markdown";
import type { RagPipeline } from "./rag/pipeline";
import { COLLECTION_NAMES } from "./types";

export const SERVER_NAME = "study-rag-server";

const collectionSchema = z.enum(COLLECTION_NAMES);

const searchArgs = z.object({
  query: z.string().min(1),
  subject: z.string().optional(),
  top_k: z.number().int().min(1).max(50).default(5),
});

const answerArgs = z.object({
  query: z.string().min(1),
  subject: z.string().optional(),
});

const gradeArgs = z.object({
  question_text: z.string().min(1),
  model_answer: z.string(),
  student_answer: z.string(),
  subject: z.string().optional(),
  rubric: z.string().optional(),
  max_score: z.number().optional(),
});

const choiceArgs = z.object({
  student_answer: z.string(),
  correct_option: z.string(),
  max_score: z.number().optional(),
});

const materialArgs = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  content: z.string().min(1),
  topic: z.string(),
  subject: z.string(),
  difficulty: z.string().optional(),
  format: z.enum(["text", "markdown"]).default("text"),
});

const questionArgs = z.object({
  id: z.string().min(1),
  question_text: z.string().min(1),
  answer_text: z.string().min(1),
  topic: z.string(),
  subject: z.string(),
  difficulty: z.string().optional(),
});

const deleteArgs = z.object({ collection: collectionSchema, id: z.string().min(1) });
const clearArgs = z.object({ collection: collectionSchema });

const subjectProp = {
  type: "string",
  description: "Only consider documents whose subject matches exactly.",
};
const collectionProp = {
  type: "string",
  enum: [...COLLECTION_NAMES],
  description: "Target collection.",
};

/** Static tool schemas served by tools/list. */
export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "search_materials",
    description:
      "Semantically search the study materials and reference questions. Returns the closest matches with their metadata and distance (lower is closer).",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Natural language search query." },
        subject: subjectProp,
        top_k: {
          type: "number",
          description: "Maximum number of materials to return (1-50). Defaults to 5 if omitted.",
          minimum: 1,
          maximum: 50,
        },
      },
      required: ["query"],
    },
  },
  {
    name: "answer_question",
    description:
      "Answer a student's question from the stored study materials. Falls back to quoting the closest materials when no generative model is available.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "The student's question." },
        subject: subjectProp,
      },
      required: ["query"],
    },
  },
  {
    name: "grade_answer",
    description:
      "Grade a free-text student answer against a model answer (and optional rubric). Returns score, feedback and confidence.",
    inputSchema: {
      type: "object",
      properties: {
        question_text: { type: "string" },
        model_answer: { type: "string" },
        student_answer: { type: "string" },
        subject: subjectProp,
        rubric: { type: "string", description: "Optional grading rubric." },
        max_score: { type: "number", description: "Maximum score (default 1).", minimum: 0 },
      },
      required: ["question_text", "model_answer", "student_answer"],
    },
  },
  {
    name: "grade_choice",
    description: "Grade a multiple-choice answer by case-insensitive comparison with the correct option.",
    inputSchema: {
      type: "object",
      properties: {
        student_answer: { type: "string" },
        correct_option: { type: "string" },
        max_score: { type: "number", description: "Maximum score (default 1).", minimum: 0 },
      },
      required: ["student_answer", "correct_option"],
    },
  },
  {
    name: "add_study_material",
    description: "Add or replace a study material. Re-using an id replaces the previous content.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string" },
        title: { type: "string" },
        content: { type: "string" },
        topic: { type: "string" },
        subject: { type: "string" },
        difficulty: { type: "string", description: "Defaults to 'intermediate'." },
        format: {
          type: "string",
          enum: ["text", "markdown"],
          description: "Markdown content is converted to plain text before storing.",
        },
      },
      required: ["id", "title", "content", "topic", "subject"],
    },
  },
  {
    name: "add_question",
    description: "Add or replace a reference question together with its answer.",
    inputSchema: {
      type: "object",
      properties: {
        id: { type: "string" },
        question_text: { type: "string" },
        answer_text: { type: "string" },
        topic: { type: "string" },
        subject: { type: "string" },
        difficulty: { type: "string", description: "Defaults to 'intermediate'." },
      },
      required: ["id", "question_text", "answer_text", "topic", "subject"],
    },
  },
  {
    name: "delete_document",
    description: "Delete one document from a collection. Deleting a missing id is not an error.",
    inputSchema: {
      type: "object",
      properties: { collection: collectionProp, id: { type: "string" } },
      required: ["collection", "id"],
    },
  },
  {
    name: "clear_collection",
    description: "Remove every document from a collection.",
    inputSchema: {
      type: "object",
      properties: { collection: collectionProp },
      required: ["collection"],
    },
  },
];

function parseArgs<T extends z.ZodTypeAny>(schema: T, tool: string, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${tool}: ${detail}`);
  }
  return parsed.data;
}

function jsonResult(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

/** Map pipeline errors onto JSON-RPC error codes; anything else propagates untouched. */
function toMcpError(e: unknown): unknown {
  if (e instanceof InvalidArgumentError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof RagError) return new McpError(ErrorCode.InternalError, e.message);
  return e;
}

async function dispatch(pipeline: RagPipeline, name: string, args: unknown): Promise<CallToolResult> {
  switch (name) {
    case "search_materials": {
      const { query, subject, top_k } = parseArgs(searchArgs, name, args);
      const result = await pipeline.retrieval.tryRetrieve(query, subject, top_k);
      if (!result.ok) throw result.error;
      return jsonResult(result.value);
    }
    case "answer_question": {
      const { query, subject } = parseArgs(answerArgs, name, args);
      return jsonResult(await pipeline.answerQuestion(query, subject));
    }
    case "grade_answer": {
      const a = parseArgs(gradeArgs, name, args);
      return jsonResult(
        await pipeline.gradeAnswer({
          questionText: a.question_text,
          modelAnswer: a.model_answer,
          studentAnswer: a.student_answer,
          subject: a.subject,
          rubric: a.rubric,
          maxScore: a.max_score,
        }),
      );
    }
    case "grade_choice": {
      const a = parseArgs(choiceArgs, name, args);
      return jsonResult(pipeline.gradeMultipleChoice(a.student_answer, a.correct_option, a.max_score));
    }
    case "add_study_material": {
      const a = parseArgs(materialArgs, name, args);
      const stored = await pipeline.addStudyMaterial({
        id: a.id,
        title: a.title,
        content: a.format === "markdown" ? markdownToText(a.content) : a.content,
        topic: a.topic,
        subject: a.subject,
        difficulty: a.difficulty,
      });
      if (!stored.ok) throw stored.error;
      return jsonResult({ id: stored.value });
    }
    case "add_question": {
      const a = parseArgs(questionArgs, name, args);
      const stored = await pipeline.addQuestion({
        id: a.id,
        questionText: a.question_text,
        answerText: a.answer_text,
        topic: a.topic,
        subject: a.subject,
        difficulty: a.difficulty,
      });
      if (!stored.ok) throw stored.error;
      return jsonResult({ id: stored.value });
    }
    case "delete_document": {
      const { collection, id } = parseArgs(deleteArgs, name, args);
      if (collection === "materials") await pipeline.deleteStudyMaterial(id);
      else await pipeline.deleteQuestion(id);
      return jsonResult({ deleted: id });
    }
    case "clear_collection": {
      const { collection } = parseArgs(clearArgs, name, args);
      await pipeline.clearCollection(collection);
      return jsonResult({ cleared: collection });
    }
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * Run one tool call against the pipeline.
 *
 * @throws {McpError} InvalidParams for bad arguments, InternalError when the
 *   store is unavailable, MethodNotFound for unknown tools.
 */
export async function handleToolCall(pipeline: RagPipeline, name: string, args: unknown): Promise<CallToolResult> {
  try {
    return await dispatch(pipeline, name, args);
  } catch (e) {
    throw toMcpError(e);
  }
}

/**
 * Factory for a new MCP Server bound to the shared pipeline. One server is
 * created per transport session; the pipeline and its store are shared.
 */
export function createServer(pipeline: RagPipeline): Server {
  const server = new Server({ name: SERVER_NAME, version: APP_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (req) =>
    handleToolCall(pipeline, req.params.name, req.params.arguments),
  );

  return server;
}
