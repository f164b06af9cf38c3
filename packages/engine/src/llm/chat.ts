import { z } from "zod";

/**
 * Response body shared by OpenAI's Chat Completions endpoint and the
 * OpenAI-compatible servers (vLLM, llama.cpp, Ollama) behind LocalClient.
 */
export const ChatCompletionSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      })
    )
    .default([]),
  usage: z
    .object({
      total_tokens: z.number().optional(),
    })
    .optional(),
});

export async function readChatCompletion(
  response: Response,
  provider: string,
  fallbackModel: string
): Promise<{ content: string; model: string; tokensUsed: number }> {
  if (!response.ok) {
    const errorBody = await response.text();
    throw new Error(`${provider} API error ${response.status}: ${errorBody}`);
  }

  const data = ChatCompletionSchema.parse(await response.json());
  const choice = data.choices[0];

  return {
    content: choice?.message.content ?? "",
    model: data.model ?? fallbackModel,
    tokensUsed: data.usage?.total_tokens ?? 0,
  };
}
