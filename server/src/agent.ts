import { GoogleGenAI } from '@google/genai';
import { z } from 'zod';

import type { CalculationEngine } from './engine.js';
import type { CalculationResult, CalculatorSummary } from './types.js';

/* ---------- Model clients ---------- */

/** A chat model that streams its reply token by token and returns the full text. */
export interface ModelClient {
  readonly name: string;
  stream(system: string, user: string, onToken: (token: string) => void): Promise<string>;
}

export type OllamaOptions = {
  baseUrl: string;
  model: string;
  fetchImpl?: typeof fetch;
};

const OllamaChunk = z.object({
  message: z.object({ content: z.string() }).partial().optional(),
  response: z.string().optional(),
  done: z.boolean().optional()
});

function tryJson(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

export class OllamaClient implements ModelClient {
  readonly name = 'ollama';
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: OllamaOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async stream(system: string, user: string, onToken: (token: string) => void): Promise<string> {
    const { baseUrl, model } = this.opts;
    const messages = [{ role: 'system', content: system }, { role: 'user', content: user }];

    let res: Response;
    try {
      res = await this.fetchImpl(`${baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, messages, stream: true, format: 'json', options: { temperature: 0 } })
      });
    } catch (e) {
      throw new Error(`Could not reach Ollama at ${baseUrl} – ${String(e)}`, { cause: e });
    }

    // Older servers only have /api/generate
    if (res.status === 404) {
      const prompt = messages.map(m => `${m.role.toUpperCase()}: ${m.content}`).join('\n\n');
      const r2 = await this.fetchImpl(`${baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model, prompt, stream: true, format: 'json', options: { temperature: 0 } })
      });
      if (!r2.ok) throw new Error(`Ollama /api/generate ${r2.status}`);
      return streamRead(r2, onToken);
    }

    if (!res.ok) throw new Error(`Ollama /api/chat ${res.status}`);
    return streamRead(res, onToken);
  }
}

/** Reads newline-delimited JSON chunks from either Ollama endpoint. */
export async function streamRead(res: Response, onToken: (token: string) => void): Promise<string> {
  if (!res.body) throw new Error('Ollama returned an empty body');
  const reader = res.body.getReader();
  const decoder = new TextDecoder();
  let buf = '';
  let full = '';

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    buf += decoder.decode(value, { stream: true });
    const lines = buf.split('\n');
    buf = lines.pop() ?? '';
    for (const line of lines) {
      const s = line.trim();
      if (!s) continue;
      const chunk = OllamaChunk.safeParse(tryJson(s));
      if (!chunk.success) continue;
      const token = chunk.data.message?.content ?? chunk.data.response ?? '';
      if (token) { onToken(token); full += token; }
      if (chunk.data.done) {
        await reader.cancel();
        return full;
      }
    }
  }
  return full;
}

export type GeminiOptions = {
  apiKey: string;
  model: string;
};

export class GeminiClient implements ModelClient {
  readonly name = 'gemini';
  private readonly ai: GoogleGenAI;

  constructor(private readonly opts: GeminiOptions) {
    this.ai = new GoogleGenAI({ apiKey: opts.apiKey });
  }

  async stream(system: string, user: string, onToken: (token: string) => void): Promise<string> {
    const result = await this.ai.models.generateContentStream({
      model: this.opts.model,
      contents: [{ role: 'user', parts: [{ text: user }] }],
      config: {
        systemInstruction: [{ text: system }],
        responseMimeType: 'application/json',
        temperature: 0
      }
    });

    let fullResponse = '';
    for await (const chunk of result) {
      const chunkText = chunk.text;
      if (chunkText) {
        onToken(chunkText);
        fullResponse += chunkText;
      }
    }
    return fullResponse;
  }
}

/* ---------- System prompt / plan contract ---------- */
export const SYSTEM_PROMPT = `
You are an engineering calculation assistant. You receive:
- a user's goal in plain language,
- the catalog of available calculators: for each, its name, title, design standard,
  status, named inputs (with units, whether required) and named outputs (with units).

Return STRICT JSON:
{ "calculator": string, "inputs": { [name: string]: number | string | boolean }, "summary": string }

Rules:
- Pick exactly one calculator whose status is "ready".
- Use only the input names the chosen calculator lists; never invent names.
- Supply every required input. Convert the user's quantities to the listed units.
- Omit optional inputs the user did not mention; their defaults apply.
- "summary" is one sentence saying what will be calculated.
- No prose outside the JSON.
`.trim();

export const PlanSchema = z.object({
  calculator: z.string().min(1),
  inputs: z.record(z.union([z.number(), z.string(), z.boolean(), z.null()])).default({}),
  summary: z.string().default('')
});

export type Plan = z.infer<typeof PlanSchema>;

export function cleanToJsonString(raw: string) {
  return String(raw)
    .replace(/^\uFEFF/, '')
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/```$/i, '')
    .trim();
}

/** Parses and validates the model's reply. */
export function parsePlan(raw: string): Plan {
  const json = tryJson(cleanToJsonString(raw));
  if (json === undefined) throw new Error(`Model returned invalid JSON. Raw output: ${raw}`);
  const parsed = PlanSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Model returned an invalid plan: ${parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

/* ---------- Streaming (SSE) ---------- */
export type AgentStreamEvent =
  | { type: 'status'; data: string }
  | { type: 'context'; data: { calculators: CalculatorSummary[] } }
  | { type: 'token'; data: string }
  | { type: 'plan'; data: Plan }
  | { type: 'result'; data: CalculationResult }
  | { type: 'error'; data: string }
  | { type: 'done'; data: string };

/* ---------- Public API ---------- */
export async function streamPlanAndExecute(
  goal: string,
  engine: CalculationEngine,
  client: ModelClient,
  on: (e: AgentStreamEvent) => void,
  signal?: AbortSignal
): Promise<CalculationResult> {
  const calculators = engine.list().filter(c => c.status === 'ready');
  on({ type: 'context', data: { calculators } });

  on({ type: 'status', data: `contacting ${client.name} model...` });
  const raw = await client.stream(SYSTEM_PROMPT, JSON.stringify({ goal, calculators }), token => on({ type: 'token', data: token }));

  on({ type: 'status', data: 'parsing plan...' });
  const plan = parsePlan(raw);
  on({ type: 'plan', data: plan });

  on({ type: 'status', data: `running ${plan.calculator}...` });
  const result = await engine.execute(plan.calculator, plan.inputs, { signal });
  on({ type: 'result', data: result });
  return result;
}
