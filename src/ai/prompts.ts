export function buildTranslationPrompt(texts: string[], targetLanguage: string): string {
    return [
        "You are a professional UI translator working on short interface strings from cards shown in chat apps.",
        `Translate every string in the JSON array below into the language with code "${targetLanguage}".`,
        "",
        "Rules:",
        "- Return a JSON array of strings with exactly the same number of entries, in the same order.",
        "- Keep placeholders such as {{DATE(...)}}, URLs, and markdown markers (*, **, _) unchanged.",
        "- Do not merge, split, drop or explain entries.",
        "- If a string is already in the target language, return it as is.",
        "",
        "Strings:",
        JSON.stringify(texts, null, 2),
        "",
        "Do not include markdown code blocks. Just the raw JSON array.",
    ].join("\n");
}
