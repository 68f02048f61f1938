import { GoogleGenAI } from "@google/genai";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export class AIClient {
    private client: GoogleGenAI;

    constructor(apiKey: string, private readonly model: string = DEFAULT_GEMINI_MODEL) {
        this.client = new GoogleGenAI({ apiKey });
    }

    async generateContent(prompt: string, signal?: AbortSignal): Promise<string> {
        const response = await this.client.models.generateContent({
            model: this.model,
            contents: [{ role: "user", parts: [{ text: prompt }] }],
            config: {
                responseMimeType: "application/json",
                abortSignal: signal,
            },
        });

        const candidate = response.candidates?.[0];
        if (!candidate) {
            throw new Error("No response candidates from Gemini.");
        }

        const part = candidate.content?.parts?.[0];
        if (!part || !part.text) {
            throw new Error("Empty response from Gemini.");
        }

        return part.text;
    }
}
