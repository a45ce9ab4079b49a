import { BaseTranslator, defaultHttpClient, HttpClient, ProviderTranslation } from './base.js';
import { hashString } from '../helpers.js';
import { TranslateOptions } from '../types.js';

interface BaiduResponse {
  from?: string;
  to?: string;
  trans_result?: Array<{ src: string; dst: string }>;
  error_code?: string;
  error_msg?: string;
}

export interface BaiduConfig {
  appId: string;
  secretKey: string;
  baseUrl?: string;
  http?: HttpClient;
  /** Salt source, replaceable for deterministic signatures */
  salt?: () => string;
}

// Baidu uses its own codes for a handful of languages
const BAIDU_CODES: Record<string, string> = {
  ja: 'jp',
  ko: 'kor',
  fr: 'fra',
  es: 'spa',
  ar: 'ara',
  vi: 'vie',
  da: 'dan',
  fi: 'fin',
  sv: 'swe',
  ro: 'rom',
  bg: 'bul',
  et: 'est',
  sl: 'slo',
};

export function toBaiduCode(lang: string): string {
  return BAIDU_CODES[lang] ?? lang;
}

export function fromBaiduCode(code: string): string {
  const entry = Object.entries(BAIDU_CODES).find(([, baidu]) => baidu === code);
  return entry ? entry[0] : code;
}

export function signBaiduRequest(appId: string, text: string, salt: string, secretKey: string): string {
  return hashString(`${appId}${text}${salt}${secretKey}`);
}

export class BaiduTranslator extends BaseTranslator {
  readonly id = 'baidu';
  readonly name = 'Baidu Translate';
  readonly confidence = 0.82;
  private appId: string;
  private secretKey: string;
  private baseUrl: string;
  private http: HttpClient;
  private salt: () => string;

  constructor(config: BaiduConfig) {
    super('baidu-translate');
    this.appId = config.appId;
    this.secretKey = config.secretKey;
    this.baseUrl = config.baseUrl || 'https://fanyi-api.baidu.com/api/trans/vip/translate';
    this.http = config.http || defaultHttpClient;
    this.salt = config.salt || (() => String(32768 + Math.floor(Math.random() * 32768)));
  }

  protected async requestTranslation(text: string, sourceLang: string, targetLang: string, _options: TranslateOptions): Promise<ProviderTranslation> {
    const salt = this.salt();
    const params = new URLSearchParams({
      q: text,
      from: toBaiduCode(sourceLang),
      to: toBaiduCode(targetLang),
      appid: this.appId,
      salt,
      sign: signBaiduRequest(this.appId, text, salt, this.secretKey),
    });

    const response = await this.http(this.baseUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: params.toString(),
    });

    if (!response.ok) {
      throw new Error(`Baidu API error: ${response.status}`);
    }

    const data = await response.json() as BaiduResponse;
    if (data.error_code || !data.trans_result || data.trans_result.length === 0) {
      throw new Error(`Baidu API error: ${data.error_code ?? 'unknown'} - ${data.error_msg ?? 'no translation returned'}`);
    }

    return {
      // Baidu answers one entry per input line
      translatedText: data.trans_result.map(entry => entry.dst).join('\n'),
      model: this.model,
      resolvedSourceLang: data.from && data.from !== 'auto' ? fromBaiduCode(data.from) : sourceLang,
      metadata: {},
    };
  }
}
