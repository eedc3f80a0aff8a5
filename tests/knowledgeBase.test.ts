/**
 * Tests for the RAG worker client.
 */

import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import {
  LambdaKnowledgeBase,
  emptyKnowledgeBase,
  formatDocumentsForPrompt,
  parseDocuments,
} from '../src/services/knowledgeBase';

const send = jest.fn();
const client = { send } as unknown as LambdaClient;
const knowledgeBase = new LambdaKnowledgeBase(client, 'arn:aws:lambda:us-east-1:000000000000:function:rag-worker');

function payload(body: unknown): Uint8Array {
  return new Uint8Array(Buffer.from(JSON.stringify(body)));
}

beforeEach(() => {
  jest.clearAllMocks();
});

describe('parseDocuments', () => {
  test('keeps documents with content and names unknown sources', () => {
    expect(parseDocuments({
      documents: [
        { content: 'Hidratación en fiebre.', source: 'guia_fiebre.pdf' },
        { content: 'Sin fuente.' },
        { content: '   ', source: 'vacio.pdf' },
        'texto suelto',
      ],
    })).toEqual([
      { content: 'Hidratación en fiebre.', source: 'guia_fiebre.pdf' },
      { content: 'Sin fuente.', source: 'Desconocida' },
    ]);
  });

  test('anything without a documents list is empty', () => {
    expect(parseDocuments(null)).toEqual([]);
    expect(parseDocuments({ documents: 'x' })).toEqual([]);
  });
});

describe('formatDocumentsForPrompt', () => {
  test('numbers each document with its source', () => {
    expect(formatDocumentsForPrompt([
      { content: 'Uno.', source: 'a.pdf' },
      { content: 'Dos.', source: 'b.pdf' },
    ])).toBe('[Documento 1 - Fuente: a.pdf]\nUno.\n\n[Documento 2 - Fuente: b.pdf]\nDos.');
  });

  test('no documents renders nothing', () => {
    expect(formatDocumentsForPrompt([])).toBe('');
  });
});

describe('LambdaKnowledgeBase', () => {
  test('invokes the worker synchronously with the query', async () => {
    send.mockResolvedValue({ Payload: payload({ documents: [{ content: 'Texto.', source: 's.pdf' }] }) });

    const documents = await knowledgeBase.retrieve('dolor de cabeza', { userId: 'u1', maxResults: 3 });

    expect(documents).toEqual([{ content: 'Texto.', source: 's.pdf' }]);
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(InvokeCommand);
    expect(command.input.FunctionName).toBe('arn:aws:lambda:us-east-1:000000000000:function:rag-worker');
    expect(command.input.InvocationType).toBe('RequestResponse');
    expect(JSON.parse(Buffer.from(command.input.Payload).toString('utf8'))).toEqual({
      query: 'dolor de cabeza',
      max_results: 3,
      user_id: 'u1',
    });
  });

  test('uses the default result count', async () => {
    send.mockResolvedValue({ Payload: payload({ documents: [] }) });

    await knowledgeBase.retrieve('sueño');

    const body = JSON.parse(Buffer.from(send.mock.calls[0][0].input.Payload).toString('utf8'));
    expect(body).toEqual({ query: 'sueño', max_results: 5 });
  });

  test('a function error yields no documents', async () => {
    send.mockResolvedValue({ FunctionError: 'Unhandled', Payload: payload({ errorMessage: 'index missing' }) });

    expect(await knowledgeBase.retrieve('tos')).toEqual([]);
  });

  test('an invocation failure yields no documents', async () => {
    send.mockRejectedValue(new Error('AccessDeniedException'));

    expect(await knowledgeBase.retrieve('tos')).toEqual([]);
  });

  test('the empty knowledge base never returns documents', async () => {
    expect(await emptyKnowledgeBase.retrieve('tos')).toEqual([]);
  });
});
