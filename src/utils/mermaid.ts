import dagre from 'dagre';
import type { ExecutionPlan } from '../runner/execution-plan.ts';

function safeId(id: string): string {
  return id.replace(/[^a-zA-Z0-9_]/g, '_');
}

function jobLabel(plan: ExecutionPlan, jobId: string): string {
  const job = plan.workflow.jobs[jobId];
  const count = plan.instancesOf(jobId).length;
  let label = job?.name && job.name !== jobId ? `${jobId}: ${job.name}` : jobId;
  if (job?.strategy?.matrix) label += ` (matrix x${count})`;
  return label;
}

/**
 * Mermaid flowchart of the job graph: one node per job, one edge per `needs` entry
 */
export function generateMermaidGraph(plan: ExecutionPlan): string {
  const lines = ['graph TD'];

  // 1. Add Nodes
  for (const jobId of plan.jobIds) {
    const job = plan.workflow.jobs[jobId];
    let label = jobLabel(plan, jobId).replace(/"/g, "'");
    if (job?.if) label += '\\n❓ Conditional';

    let style = ':::default';
    if (job?.strategy?.matrix) style = ':::matrix';
    else if (job?.concurrency) style = ':::concurrency';

    lines.push(`  ${safeId(jobId)}["${label}"]${style}`);
  }

  // 2. Add Edges (Dependencies)
  for (const jobId of plan.jobIds) {
    for (const need of plan.workflow.jobs[jobId]?.needs ?? []) {
      lines.push(`  ${safeId(need)} --> ${safeId(jobId)}`);
    }
  }

  // 3. Define Styles
  lines.push('  classDef matrix fill:#e1f5fe,stroke:#01579b,stroke-width:2px;');
  lines.push(
    '  classDef concurrency fill:#fff3e0,stroke:#e65100,stroke-width:2px,stroke-dasharray: 5 5;'
  );
  lines.push('  classDef default fill:#fff,stroke:#333,stroke-width:1px;');

  return lines.join('\n');
}

/**
 * Renders the job graph as ASCII using dagre for layout.
 */
export function renderWorkflowAsAscii(plan: ExecutionPlan): string {
  const g = new dagre.graphlib.Graph();
  g.setGraph({ rankdir: 'LR', nodesep: 2, edgesep: 1, ranksep: 4 });
  g.setDefaultEdgeLabel(() => ({}));

  const nodeWidth = 16;
  const nodeHeight = 3;

  for (const jobId of plan.jobIds) {
    let label = jobLabel(plan, jobId);
    if (plan.workflow.jobs[jobId]?.if) label = `IF ${label}`;

    const width = Math.max(nodeWidth, label.length + 4);
    g.setNode(jobId, { label, width, height: nodeHeight });

    for (const need of plan.workflow.jobs[jobId]?.needs ?? []) {
      g.setEdge(need, jobId);
    }
  }

  dagre.layout(g);

  const boxes = g.nodes().map((v) => {
    const node = g.node(v);
    return {
      label: node.label ?? v,
      left: Math.floor(node.x - node.width / 2),
      top: Math.floor(node.y - node.height / 2),
      width: Math.floor(node.width),
      height: Math.floor(node.height),
    };
  });
  const paths = g.edges().map((e) =>
    g.edge(e).points.map((p) => ({ x: Math.floor(p.x), y: Math.floor(p.y) }))
  );

  const xs = [
    ...boxes.flatMap((b) => [b.left, b.left + b.width]),
    ...paths.flatMap((points) => points.map((p) => p.x)),
  ];
  const ys = [
    ...boxes.flatMap((b) => [b.top, b.top + b.height]),
    ...paths.flatMap((points) => points.map((p) => p.y)),
  ];
  const canvas = new Canvas(Math.min(...xs), Math.min(...ys), Math.max(...xs), Math.max(...ys));

  for (const box of boxes) {
    const right = box.left + box.width - 1;
    const bottom = box.top + box.height - 1;
    canvas.hline(box.left, right, box.top, '-');
    canvas.hline(box.left, right, bottom, '-');
    canvas.vline(box.left, box.top, bottom, '|');
    canvas.vline(right, box.top, bottom, '|');
    for (const [x, y] of [
      [box.left, box.top],
      [right, box.top],
      [box.left, bottom],
      [right, bottom],
    ]) {
      canvas.set(x, y, '+');
    }
    const labelLeft = box.left + Math.floor((box.width - box.label.length) / 2);
    canvas.text(labelLeft, box.top + Math.floor(box.height / 2), box.label);
  }

  for (const points of paths) {
    for (let i = 0; i < points.length - 1; i++) {
      const from = points[i];
      const to = points[i + 1];
      // Orthogonal routing: across first, then down or up
      if (from.x !== to.x) {
        canvas.hline(from.x, to.x, from.y, '-');
        if (from.y !== to.y) canvas.set(to.x, from.y, '+');
      }
      if (from.y !== to.y) {
        const step = to.y > from.y ? 1 : -1;
        canvas.vline(to.x, from.y + step, to.y, '|');
      }
    }

    const last = points[points.length - 1];
    const prev = points[points.length - 2];
    if (last && prev) {
      if (last.x > prev.x) canvas.set(last.x, last.y, '>');
      else if (last.x < prev.x) canvas.set(last.x, last.y, '<');
      else if (last.y > prev.y) canvas.set(last.x, last.y, 'v');
      else if (last.y < prev.y) canvas.set(last.x, last.y, '^');
    }
  }

  return canvas.toString();
}

/**
 * Character grid addressed in layout coordinates
 */
class Canvas {
  private readonly rows: string[][];

  constructor(
    private readonly minX: number,
    private readonly minY: number,
    maxX: number,
    maxY: number
  ) {
    const width = maxX - minX + 1;
    const height = maxY - minY + 1;
    this.rows = Array.from({ length: height }, () => Array.from({ length: width }, () => ' '));
  }

  set(x: number, y: number, char: string): void {
    const row = this.rows[y - this.minY];
    const column = x - this.minX;
    if (row && column >= 0 && column < row.length) row[column] = char;
  }

  text(x: number, y: number, text: string): void {
    for (let i = 0; i < text.length; i++) this.set(x + i, y, text.charAt(i));
  }

  hline(x1: number, x2: number, y: number, char: string): void {
    for (let x = Math.min(x1, x2); x <= Math.max(x1, x2); x++) this.set(x, y, char);
  }

  vline(x: number, y1: number, y2: number, char: string): void {
    for (let y = Math.min(y1, y2); y <= Math.max(y1, y2); y++) this.set(x, y, char);
  }

  toString(): string {
    return this.rows
      .map((row) => row.join('').trimEnd())
      .join('\n')
      .replace(/^\n+|\n+$/g, '');
  }
}
