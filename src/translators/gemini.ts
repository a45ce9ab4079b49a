import { GoogleGenerativeAI, HarmCategory, HarmBlockThreshold } from '@google/generative-ai';
import { BaseTranslator, ProviderTranslation, SYSTEM_PROMPT } from './base.js';
import { TranslateOptions } from '../types.js';

export class GeminiTranslator extends BaseTranslator {
  readonly id = 'gemini';
  readonly name = 'Google Gemini';
  readonly confidence = 0.87;
  private genAI: GoogleGenerativeAI;

  constructor(apiKey: string, modelName: string = 'gemini-1.5-flash') {
    super(modelName);
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  protected async requestTranslation(text: string, sourceLang: string, targetLang: string, options: TranslateOptions): Promise<ProviderTranslation> {
    const modelName = this.resolveModel(options);
    const model = this.genAI.getGenerativeModel({
      model: modelName,
      systemInstruction: SYSTEM_PROMPT,
      generationConfig: {
        temperature: 0.3,
        topP: 0.8,
        maxOutputTokens: Math.max(256, text.length * 3),
      },
      safetySettings: [
        {
          category: HarmCategory.HARM_CATEGORY_HARASSMENT,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
        {
          category: HarmCategory.HARM_CATEGORY_HATE_SPEECH,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
        {
          category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
        {
          category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT,
          threshold: HarmBlockThreshold.BLOCK_NONE,
        },
      ],
    });

    const result = await model.generateContent({
      contents: [{ role: 'user', parts: [{ text: this.buildPrompt(text, sourceLang, targetLang, options) }] }],
    });

    const usage = result.response.usageMetadata;
    return {
      translatedText: result.response.text().trim(),
      model: modelName,
      metadata: {
        style: options.style ?? 'natural',
        usage: usage
          ? { inputTokens: usage.promptTokenCount, outputTokens: usage.candidatesTokenCount }
          : null,
      },
    };
  }
}
