/**
 * Lightweight Markdown → plain text conversion for material content. Keeps
 * link and image text, drops code, markup and HTML tags.
 */
export function markdownToText(md: string): string {
  return md
    .replace(/```[\s\S]*?```/g, "\n") // code fences
    .replace(/`([^`]*)`/g, "$1") // inline code
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, "$1") // images → alt text
    .replace(/\[([^\]]+)\]\([^)]+\)/g, "$1") // links → link text
    .replace(/^#+\s*/gm, "") // headings
    .replace(/<[^>]+>/g, "") // HTML tags
    .replace(/\*\*(.*?)\*\*/g, "$1")
    .replace(/\*(.*?)\*/g, "$1")
    .replace(/__(.*?)__/g, "$1")
    .replace(/\b_(.*?)_\b/g, "$1")
    .replace(/\n{2,}/g, "\n\n")
    .trim();
}
