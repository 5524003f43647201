import { PromptTemplate, TemplateType } from './types.js';
import { LegacyTemplate } from './LegacyTemplate.js';
import { ChatTemplate } from './ChatTemplate.js';

// Model families whose Ollama chat templates handle a system + history message list well
const CHAT_FAMILIES = ['llama3', 'llama-3', 'command-r', 'cohere', 'chatml', 'mistral', 'qwen', 'gemma', 'phi3'];

/**
 * Factory for creating prompt templates
 */
export class TemplateFactory {
  private static templates: Map<TemplateType, PromptTemplate> = new Map<TemplateType, PromptTemplate>([
    ['legacy', new LegacyTemplate()],
    ['chat', new ChatTemplate()],
  ]);

  /**
   * Get a template instance by type
   */
  static getTemplate(type: TemplateType): PromptTemplate {
    const template = this.templates.get(type);
    if (!template) {
      throw new Error(`Unknown template type: ${type}`);
    }
    return template;
  }

  /**
   * Auto-detect template type based on model name
   */
  static detectTemplateType(modelName: string): TemplateType {
    const name = modelName.toLowerCase();
    return CHAT_FAMILIES.some((family) => name.includes(family)) ? 'chat' : 'legacy';
  }

  /**
   * Configured template for a model, falling back to detection
   */
  static forModel(modelName: string, overrides: Record<string, TemplateType> = {}): PromptTemplate {
    return this.getTemplate(overrides[modelName] ?? this.detectTemplateType(modelName));
  }
}
