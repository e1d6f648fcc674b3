import { MessageContent } from "@langchain/core/messages";

type MessageContentPart = Exclude<MessageContent, string>[number];

function getSingleTextContent(part: MessageContentPart): string {
  if (typeof part === "string") {
    return part;
  }
  if ("text" in part && typeof part.text === "string") {
    return part.text;
  }
  return "";
}

/**
 * Helper function to extract text content from various message types.
 * Non-text parts (images, tool calls) contribute nothing.
 *
 * @param content - The message content to process
 * @returns The extracted text content
 */
export function getTextContent(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  } else if (Array.isArray(content)) {
    return content.map(getSingleTextContent).join("");
  }
  return "";
}

/**
 * Title-cases a budget category key such as "activities_and_shopping".
 */
export function titleCase(value: string): string {
  return value
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}
