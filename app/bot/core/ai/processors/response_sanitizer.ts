/**
 * Nettoie la sortie du modèle : bloc de raisonnement `<think>` en tête et
 * mise en forme markdown (gras, italique), la messagerie n'affichant que
 * du texte brut.
 */
export function sanitizeResponse(text: string): string {
  return stripMarkdown(text.trim().replace(/^[\s\S]*?<\/think>\s*/, '')).trim()
}

export function stripMarkdown(text: string): string {
  return text
    .replace(/\*\*(.*?)\*\*/g, '$1')
    .replace(/__(.*?)__/g, '$1')
    .replace(/(?<!\*)\*(?!\s)(.*?)(?<!\s)\*(?!\*)/g, '$1')
    .replace(/(?<![\p{L}\p{N}_])_(?!\s)(.*?)(?<!\s)_(?![\p{L}\p{N}_])/gu, '$1')
}
