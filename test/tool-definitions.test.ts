import { describe, test, expect } from 'vitest';
import { TOOL_DEFINITIONS } from '../src/tool-definitions';
import { DEFAULT_LAYOUT_CONFIG } from '../src/constants';

function findTool(name: string) {
  const tool = TOOL_DEFINITIONS.find((t) => t.name === name);
  if (!tool) throw new Error(`No tool ${name}`);
  return tool;
}

describe('tool-definitions', () => {
  const toolNames = TOOL_DEFINITIONS.map((t) => t.name);

  test('exports the expected tools in order', () => {
    expect(toolNames).toEqual([
      'generate_diagram',
      'layout_diagram',
      'validate_diagram',
      'list_diagram_styles',
    ]);
  });

  test("every tool has an inputSchema with type 'object'", () => {
    for (const tool of TOOL_DEFINITIONS) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.description.length).toBeGreaterThan(0);
    }
  });

  test.each(['generate_diagram', 'layout_diagram', 'validate_diagram'])(
    '%s requires a diagram',
    (name) => {
      expect(findTool(name).inputSchema.required).toEqual(['diagram']);
    }
  );

  test('list_diagram_styles takes no arguments', () => {
    const schema = findTool('list_diagram_styles').inputSchema;
    expect(schema.required).toBeUndefined();
    expect(Object.keys(schema.properties)).toEqual([]);
  });

  test('generate_diagram offers every output option', () => {
    expect(Object.keys(findTool('generate_diagram').inputSchema.properties)).toEqual([
      'diagram',
      'format',
      'style',
      'outputPath',
      'save',
      'layout',
    ]);
  });

  test('layout override description names every config key', () => {
    const layout = findTool('layout_diagram').inputSchema.properties.layout;
    const description = 'description' in layout ? String(layout.description) : '';
    for (const key of Object.keys(DEFAULT_LAYOUT_CONFIG)) {
      expect(description, `missing ${key}`).toContain(key);
    }
  });
});
