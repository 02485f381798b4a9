import { ConfigService } from '@nestjs/config';
import { AIMessage, HumanMessage } from '@langchain/core/messages';
import { ResilienceService } from '../../common/resilience/resilience.service';
import { readPipelineSettings } from '../../config/pipeline.settings';
import {
  FakeAnswerGenerator,
  FakeVectorSearch,
  FakeWebSearch,
  handbookHit,
} from '../../../test/fakes/fake-capabilities';
import { buildChatGraph } from './chat-workflow.service';
import { createInitialState } from './state/chat-state';

describe('buildChatGraph', () => {
  const configService = new ConfigService({ VECTOR_NAMESPACE: 'handbook' });

  const run = async (
    vectorSearch: FakeVectorSearch,
    webSearch: FakeWebSearch,
    answerGenerator: FakeAnswerGenerator,
    query = 'vpn',
  ) => {
    const graph = buildChatGraph({
      settings: readPipelineSettings(configService),
      resilience: new ResilienceService(configService),
      vectorSearch,
      webSearch,
      answerGenerator,
    });
    return graph.invoke(createInitialState({ query }));
  };

  it('goes straight to generation when retrieval is strong', async () => {
    const vectorSearch = new FakeVectorSearch();
    vectorSearch.hits = [handbookHit(0.9)];
    const webSearch = new FakeWebSearch();
    const answerGenerator = new FakeAnswerGenerator();

    const state = await run(vectorSearch, webSearch, answerGenerator);

    expect(state.namespace).toBe('handbook');
    expect(state.webToolAvailable).toBe(true);
    expect(state.webFallbackUsed).toBe(false);
    expect(state.webResults).toEqual([]);
    expect(state.answer).toBe('Grounded answer [1].');
    expect(state.currentStage).toBe('formatResponse');
    expect(webSearch.calls).toHaveLength(0);
  });

  it('runs web search between decision and generation on weak retrieval', async () => {
    const vectorSearch = new FakeVectorSearch();
    vectorSearch.hits = [handbookHit(0.2)];
    const webSearch = new FakeWebSearch();
    webSearch.results = [
      { title: '', url: 'https://docs.example/vpn', content: 'Public notes.' },
    ];
    const answerGenerator = new FakeAnswerGenerator();

    const state = await run(vectorSearch, webSearch, answerGenerator);

    expect(state.webFallbackUsed).toBe(true);
    expect(state.webResults).toEqual([
      {
        source: 'web',
        title: 'https://docs.example/vpn',
        url: 'https://docs.example/vpn',
        score: 0,
        chunkText: 'Public notes.',
      },
    ]);

    // the prompt numbers retrieved snippets before web snippets
    const messages = answerGenerator.calls[0] ?? [];
    const prompt = messages[messages.length - 1];
    expect(prompt).toBeInstanceOf(HumanMessage);
    expect(prompt?.content).toContain(
      '[1] (handbook) VPN access\n\nInstall the VPN client before your first day.\n\n[2] (web) https://docs.example/vpn',
    );
  });

  it('feeds history into the prompt', async () => {
    const vectorSearch = new FakeVectorSearch();
    vectorSearch.hits = [handbookHit(0.9)];
    const answerGenerator = new FakeAnswerGenerator();
    const graph = buildChatGraph({
      settings: readPipelineSettings(configService),
      resilience: new ResilienceService(configService),
      vectorSearch,
      webSearch: new FakeWebSearch(),
      answerGenerator,
    });

    await graph.invoke(
      createInitialState({
        query: 'And on Linux?',
        chatHistory: [{ role: 'assistant', content: 'Use the VPN client.' }],
      }),
    );

    expect(answerGenerator.calls[0]?.[1]).toBeInstanceOf(AIMessage);
  });
});
