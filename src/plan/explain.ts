import { formatExpr } from '../query/expr.js';
import type { LogicalPlan, PlanStep } from './types.js';

function describeStep(step: PlanStep): string {
  switch (step.op) {
    case 'scan':
      return step.includes.length === 0
        ? `scan ${step.entity}`
        : `scan ${step.entity} with ${step.includes.join(', ')}`;
    case 'filter':
      return `filter ${formatExpr(step.predicate)}`;
    case 'project':
      return `project {${step.fields.map((f) => `${f.name}: ${formatExpr(f.expr)}`).join(', ')}}`;
    case 'join': {
      const on = step.keys.map((k) => `${formatExpr(k.left)} = ${formatExpr(k.right)}`).join(' AND ');
      return `join ${step.leftAs}, ${step.rightAs} on ${on}`;
    }
    case 'group':
      return `group by ${formatExpr(step.key)}`;
    case 'sort':
      return `order by ${formatExpr(step.key)} ${step.direction}`;
    case 'aggregate': {
      const arg = step.field === null ? '*' : formatExpr(step.field);
      return `aggregate ${step.fn}(${arg}) as ${step.as}${step.grouped ? ' per group' : ''}`;
    }
    case 'let':
      return step.value.kind === 'expr'
        ? `let ${step.name} = ${formatExpr(step.value.expr)}`
        : `let ${step.name} = subquery.${step.value.column}`;
    case 'limit':
      return `limit take=${step.take ?? 'all'} skip=${step.skip}`;
  }
}

function inputsOf(step: PlanStep): number[] {
  switch (step.op) {
    case 'scan':
      return [];
    case 'join':
      return [step.left, step.right];
    default:
      return [step.input];
  }
}

/**
 * Renders a plan as an indented tree, output step first. The text depends
 * only on the plan, so it doubles as the in-memory adapter's query string.
 */
export function explain(plan: LogicalPlan): string {
  const lines: string[] = [];
  const render = (p: LogicalPlan, id: number, depth: number): void => {
    const step = p.steps[id];
    if (step === undefined) return;
    lines.push(`${'  '.repeat(depth)}${describeStep(step)}`);
    if (step.op === 'let' && step.value.kind === 'subquery') {
      render(step.value.plan, step.value.plan.output, depth + 2);
    }
    for (const input of inputsOf(step)) render(p, input, depth + 1);
  };
  render(plan, plan.output, 0);
  return lines.join('\n');
}
