import { ModelDescription } from '../../models';

export function formatModels(models: readonly ModelDescription[]): string[] {
  const width = Math.max(...models.map(m => m.name.length));
  const lines: string[] = [];
  for (const model of models) {
    const base = model.requiresBase ? '  (needs --base n)' : '';
    lines.push(`${model.name.padEnd(width)}  ${model.formula}  [${model.parameters.join(', ')}]${base}`);
    if (model.caveat) {
      lines.push(`${''.padEnd(width)}  ! ${model.caveat}`);
    }
  }
  return lines;
}
