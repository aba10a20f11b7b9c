import { createPipeline } from "../services/pipeline";
import { InlineTaskScheduler } from "../services/queue-service";
import {
  BagOfWordsEmbeddingProvider,
  RecordingChatClient,
  ScriptedCompletionProvider,
  silentLogger,
  testPipelineConfig,
  textFile,
} from "./fakes";

const POLICY_A = [
  "Vacation: staff receive twenty five vacation days each year.",
  "Sick leave: report sick leave to your manager by ten.",
  "Remote work: employees may work remotely two days a week.",
].join(" ");

describe("ingest then ask", () => {
  it("should answer from the matching chunk and cite its document", async () => {
    const completion = new ScriptedCompletionProvider(
      () => "Employees may work remotely two days a week [S1].",
    );
    const pipeline = createPipeline(testPipelineConfig(), {
      embeddingProvider: new BagOfWordsEmbeddingProvider(),
      completionProvider: completion,
      chat: new RecordingChatClient({}),
      scheduler: new InlineTaskScheduler(silentLogger),
      logger: silentLogger,
    });

    const ingested = await pipeline.ingestion.ingest({
      source: { kind: "file", fileId: "F100", name: "policy-a.txt" },
      load: async () => textFile(POLICY_A),
      fileType: "text",
      title: "Policy A",
    });
    expect(ingested.chunkCount).toBe(3);

    const question = "What is the remote work policy?";
    const passages = await pipeline.responder.retrieve(question);
    expect(passages.map(p => p.record.text)).toEqual([
      "Remote work: employees may work remotely two days a week.",
    ]);

    const answer = await pipeline.responder.answer(question);
    expect(answer.grounded).toBe(true);
    expect(answer.citations.map(c => c.title)).toEqual(["Policy A"]);
    expect(completion.requests[0].prompt).toBe(
      "Sources:\n\n[S1] Policy A\nRemote work: employees may work remotely two days a week.\n\nQuestion: What is the remote work policy?",
    );
  });
});
