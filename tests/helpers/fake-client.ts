import type { ModelClient, ModelRequest, ModelResult } from '../../src/llm.js';

/** Records requests and replies with a canned response or failure. */
export class FakeModelClient implements ModelClient {
  requests: ModelRequest[] = [];
  private reply: () => Promise<ModelResult>;

  constructor(text = '```powershell\nGet-Process\n```') {
    this.reply = async () => ({ text, durationMs: 42 });
  }

  failWith(error: unknown): this {
    this.reply = () => Promise.reject(error);
    return this;
  }

  async generate(request: ModelRequest): Promise<ModelResult> {
    this.requests.push(request);
    return this.reply();
  }
}
