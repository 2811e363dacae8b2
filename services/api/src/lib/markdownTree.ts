export type MarkdownTreeNode = {
  header: boolean;
  text: string;
  children: MarkdownTreeNode[];
};

type BuildNode = {
  level: number;
  header: boolean;
  text: string;
  children: BuildNode[];
};

function toTreeNode(node: BuildNode): MarkdownTreeNode {
  return { header: node.header, text: node.text, children: node.children.map(toTreeNode) };
}

/**
 * Parses headings into a tree nested by heading level. Body lines between
 * two headings are joined with spaces into one non-header child of the
 * heading above them. The result always has a single synthetic "root".
 */
export function parseMarkdownTree(markdown: string): MarkdownTreeNode[] {
  const root: BuildNode = { level: 0, header: true, text: "", children: [] };
  const stack: BuildNode[] = [root];
  let content: BuildNode = { level: 0, header: false, text: "", children: [] };

  const top = (): BuildNode => stack[stack.length - 1] ?? root;

  for (const line of markdown.split(/\r?\n/)) {
    const stripped = line.trim();
    if (stripped.startsWith("#")) {
      const level = /^#+/.exec(stripped)?.[0].length ?? 1;
      const text = stripped.slice(level).trim();

      if (content.text) {
        top().children.push(content);
        content = { level: 0, header: false, text: "", children: [] };
      }

      const node: BuildNode = { level, header: true, text, children: [] };
      while (stack.length > 1 && level <= top().level) stack.pop();
      top().children.push(node);
      stack.push(node);
    } else if (stripped) {
      content.text = `${content.text} ${stripped}`.trim();
    }
  }
  if (content.text) top().children.push(content);

  return [{ text: "root", header: true, children: root.children.map(toTreeNode) }];
}
