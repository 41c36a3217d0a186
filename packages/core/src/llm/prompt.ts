/**
 * Prompt construction for SQL translation.
 */

import type OpenAI from 'openai';

export interface PromptOptions {
  /** Table the questions are about. Default: ventas */
  table?: string;
  /** Column list shown to the model, e.g. "total REAL" */
  columns?: string[];
}

export const DEFAULT_VENTAS_COLUMNS: readonly string[] = [
  'fecha TEXT (YYYY-MM-DD)',
  'ciudad TEXT',
  'vendedor TEXT',
  'producto TEXT',
  'cantidad INTEGER',
  'total REAL',
];

const JSON_FORMAT_INSTRUCTIONS = `Responde ÚNICAMENTE con un objeto JSON con esta forma:
{"sql": "<una sola consulta SELECT>", "notes": "<supuestos, opcional>"}

Reglas:
- No uses bloques de código markdown.
- No escribas texto antes ni después del JSON.`;

export function buildMessages(question: string, options: PromptOptions = {}): OpenAI.ChatCompletionMessageParam[] {
  const table = options.table ?? 'ventas';
  const columns = options.columns ?? DEFAULT_VENTAS_COLUMNS;

  const systemPrompt = `Eres un asistente que traduce preguntas en lenguaje natural sobre ventas a consultas SQL seguras para la tabla '${table}'. Solo genera consultas SELECT.

Columnas de '${table}':
${columns.map((c) => `  - ${c}`).join('\n')}

RESTRICCIONES:
- Genera UNA sola sentencia SQL.
- Nunca uses INSERT, UPDATE, DELETE, DROP ni ALTER.
- Si la pregunta pide un gráfico, devuelve primero la columna de categoría y después la columna numérica.

${JSON_FORMAT_INSTRUCTIONS}`;

  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: `Pregunta: ${question}\nSQL:` },
  ];
}
