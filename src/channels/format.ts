// Model output is GitHub-flavored Markdown; Slack renders its own mrkdwn dialect.
// Code is lifted out behind placeholders first so the inline rules never touch it.

interface CodeBlock {
  code: string;
  inline: boolean;
}

const PLACEHOLDER_PREFIX = '\x00CB';
const PLACEHOLDER_SUFFIX = '\x00';

function extractCodeBlocks(text: string): { cleaned: string; blocks: Map<string, CodeBlock> } {
  const blocks = new Map<string, CodeBlock>();
  let counter = 0;

  let cleaned = text.replace(/```\w*\n([\s\S]*?)```/g, (_match, code: string) => {
    const id = `${PLACEHOLDER_PREFIX}${counter++}${PLACEHOLDER_SUFFIX}`;
    blocks.set(id, { code: code.replace(/\n$/, ''), inline: false });
    return id;
  });

  cleaned = cleaned.replace(/`([^`\n]+)`/g, (_match, code: string) => {
    const id = `${PLACEHOLDER_PREFIX}${counter++}${PLACEHOLDER_SUFFIX}`;
    blocks.set(id, { code, inline: true });
    return id;
  });

  return { cleaned, blocks };
}

function restoreCodeBlocks(text: string, blocks: Map<string, CodeBlock>): string {
  let result = text;
  for (const [id, block] of blocks) {
    const rendered = block.inline ? `\`${block.code}\`` : `\`\`\`\n${block.code}\n\`\`\``;
    // Function replacer: code may contain `$&` and friends
    result = result.replace(id, () => rendered);
  }
  return result;
}

export function formatSlack(markdown: string): string {
  const { cleaned, blocks } = extractCodeBlocks(markdown);

  let text = cleaned;

  // Slack treats these three as control characters
  text = text.replace(/&/g, '&amp;');
  text = text.replace(/</g, '&lt;');
  text = text.replace(/^>\s?(.*)$/gm, '\x01$1');
  text = text.replace(/>/g, '&gt;');
  text = text.replace(/^\x01(.*)$/gm, '> $1');

  // Bold+italic before bold before italic
  text = text.replace(/\*{3}(.+?)\*{3}/g, '\x02_$1_\x02');
  text = text.replace(/\*{2}(.+?)\*{2}/g, '\x02$1\x02');
  text = text.replace(/(?<!\*)\*(?!\*)(.+?)(?<!\*)\*(?!\*)/g, '_$1_');
  text = text.replace(/\x02/g, '*');
  text = text.replace(/~~(.+?)~~/g, '~$1~');
  text = text.replace(/!\[([^\]]*)\]\(([^)]+)\)/g, '<$2|$1>');
  text = text.replace(/\[([^\]]+)\]\(([^)]+)\)/g, '<$2|$1>');
  text = text.replace(/^#{1,6}\s+(.+)$/gm, '*$1*');
  text = text.replace(/^-{3,}$/gm, '———');
  // List bullets
  text = text.replace(/^(\s*)[-*]\s+/gm, '$1• ');

  return restoreCodeBlocks(text, blocks);
}
