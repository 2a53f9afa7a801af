/**
 * CHECK script - Verify the Gemini API key and connection
 * Run: npm run check
 *
 * Sends a short text request and lists a few available Gemini models.
 */

import { GoogleGenAI } from '@google/genai';
import { loadConfig, loadCredential, loadEnvFile } from './config/config';
import { toTranscriptionError } from './transcription/gemini-client';
import { describeError } from './shared/errors';

const MODELS_TO_SHOW = 3;

async function listGeminiModels(ai: GoogleGenAI): Promise<string[]> {
    const names: string[] = [];
    const pager = await ai.models.list();
    for await (const model of pager) {
        if (model.name && model.name.toLowerCase().includes('gemini')) {
            names.push(model.name);
        }
    }
    return names;
}

async function main(): Promise<number> {
    console.log('🔌 Testing Gemini API connection...');
    console.log('='.repeat(40));

    loadEnvFile();
    const config = await loadConfig();
    const apiKey = loadCredential(config);
    console.log('✅ API key found');

    const ai = new GoogleGenAI({ apiKey });

    try {
        const response = await ai.models.generateContent({
            model: config.model.name,
            contents: `Say "Hello, I am ${config.model.name} and I am ready to transcribe audio!"`,
            config: { temperature: config.model.temperature, maxOutputTokens: 50 },
        });
        console.log(`✅ Text generation works: ${response.text?.trim() ?? '(empty response)'}`);
    } catch (error) {
        const failure = toTranscriptionError(error);
        console.error(`❌ Request failed: ${describeError(failure)}`);
        console.error('\nPossible issues:');
        console.error('- Invalid API key');
        console.error('- Network connection problems');
        console.error('- API quota exceeded');
        return 1;
    }

    try {
        const models = await listGeminiModels(ai);
        console.log(`✅ Found ${models.length} Gemini model(s)`);
        for (const name of models.slice(0, MODELS_TO_SHOW)) {
            console.log(`   - ${name}`);
        }
    } catch (error) {
        console.warn(`⚠️ Could not list models: ${describeError(error)}`);
    }

    console.log('\n✨ Ready! Run "npm run transcribe" to transcribe your audio files.');
    return 0;
}

main()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(`❌ ${describeError(error)}`);
        process.exitCode = 1;
    });
