import type { PromptPreset } from "./schema.js";

export interface PresetDefinition {
  label: string;
  template: string;
}

export const PRESETS: Record<Exclude<PromptPreset, "none">, PresetDefinition> = {
  list_files: {
    label: "List files",
    template: "List the files in a directory",
  },
  manage_processes: {
    label: "Manage processes",
    template: "Manage running processes",
  },
  manage_services: {
    label: "Manage services",
    template: "Manage Windows services",
  },
};

export function presetTemplate(preset: PromptPreset): string | null {
  return preset === "none" ? null : PRESETS[preset].template;
}

/**
 * Prefix a description with the preset's template. A blank description
 * collapses to the template alone.
 */
export function applyPreset(description: string, preset: PromptPreset): string {
  const template = presetTemplate(preset);
  if (template === null) return description;
  const trimmed = description.trim();
  return trimmed ? `${template}, ${trimmed}` : template;
}
