import type { Template } from '../entities/template.js';

export interface TemplateSerializer {
  load(path: string): Promise<Template>;
  save(template: Template, path: string): Promise<void>;
}
