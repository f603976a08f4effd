import fs from 'fs/promises'
import path from 'path'
import { executePython } from './executor'
import type { Artifact, ChartKind, ChartSpec } from './types'

export interface ChartRenderer {
  readonly extension: string
  render(spec: ChartSpec, filePath: string): Promise<void>
}

// ========== Artifact naming ==========

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0')
}

export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
    + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    + `_${pad(date.getMilliseconds(), 3)}`
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

/** Issues `<kind>_chart_<timestamp>.<ext>` names that are unique in the output directory */
export class ArtifactNamer {
  private issued = new Set<string>()

  constructor(
    private readonly outputDir: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async next(kind: ChartKind, extension: string): Promise<Artifact> {
    const created = this.now()
    const base = `${kind}_chart_${formatTimestamp(created)}`
    let fileName = `${base}.${extension}`
    let suffix = 1

    while (this.issued.has(fileName) || await exists(path.join(this.outputDir, fileName))) {
      fileName = `${base}_${suffix++}.${extension}`
    }
    this.issued.add(fileName)

    return {
      kind,
      fileName,
      filePath: path.join(this.outputDir, fileName),
      createdAt: created.toISOString(),
    }
  }
}

// ========== matplotlib renderer ==========

const RENDER_SCRIPT = `
import json
import sys
import matplotlib
matplotlib.use("Agg")
import matplotlib.pyplot as plt

spec = json.load(sys.stdin)
out_path = __OUT__
kind = spec["kind"]

if kind == "bar":
    plt.figure(figsize=(12, 8))
    bars = plt.bar(spec["categories"], spec["values"])
    plt.xlabel(spec["xLabel"], fontsize=12)
    plt.ylabel(spec["yLabel"], fontsize=12)
    plt.xticks(rotation=45)
    for bar in bars:
        height = bar.get_height()
        plt.text(bar.get_x() + bar.get_width() / 2.0, height, f"{height:.1f}", ha="center", va="bottom")
elif kind == "line":
    from datetime import datetime
    xs = [datetime.fromisoformat(p["x"].replace("Z", "+00:00")) for p in spec["points"]]
    ys = [p["y"] for p in spec["points"]]
    plt.figure(figsize=(12, 8))
    plt.plot(xs, ys, marker="o", linewidth=2, markersize=6)
    plt.xlabel(spec["xLabel"], fontsize=12)
    plt.ylabel(spec["yLabel"], fontsize=12)
    plt.xticks(rotation=45)
    plt.grid(True, alpha=0.3)
elif kind == "pie":
    plt.figure(figsize=(10, 10))
    colors = plt.cm.Set3(range(len(spec["counts"])))
    _, _, autotexts = plt.pie(spec["counts"], labels=spec["labels"], autopct="%1.1f%%", colors=colors, startangle=90)
    for autotext in autotexts:
        autotext.set_color("white")
        autotext.set_fontweight("bold")
elif kind == "heatmap":
    import numpy as np
    cols = spec["columns"]
    matrix = np.array([[np.nan if v is None else v for v in row] for row in spec["matrix"]], dtype=float)
    fig, ax = plt.subplots(figsize=(12, 10))
    image = ax.imshow(matrix, cmap="coolwarm", vmin=-1, vmax=1)
    fig.colorbar(image, ax=ax)
    ax.set_xticks(range(len(cols)))
    ax.set_xticklabels(cols, rotation=45, ha="right")
    ax.set_yticks(range(len(cols)))
    ax.set_yticklabels(cols)
    for i in range(len(cols)):
        for j in range(len(cols)):
            if not np.isnan(matrix[i, j]):
                ax.text(j, i, f"{matrix[i, j]:.2f}", ha="center", va="center")
else:
    raise ValueError(f"Unknown chart kind: {kind}")

plt.title(spec["title"], fontsize=16, fontweight="bold")
plt.tight_layout()
plt.savefig(out_path, dpi=150, bbox_inches="tight")
plt.close("all")
`.trim()

/** Script for one chart; the spec itself is read from stdin */
export function buildRenderScript(filePath: string): string {
  // A JSON string literal is also a valid Python string literal
  return RENDER_SCRIPT.replace('__OUT__', () => JSON.stringify(filePath))
}

export class MatplotlibRenderer implements ChartRenderer {
  readonly extension = 'png'

  constructor(private readonly options: { pythonPath?: string; timeout?: number; cwd?: string } = {}) {}

  async render(spec: ChartSpec, filePath: string): Promise<void> {
    const start = Date.now()
    const result = await executePython(buildRenderScript(filePath), {
      cwd: this.options.cwd ?? path.dirname(filePath),
      timeout: this.options.timeout,
      pythonPath: this.options.pythonPath,
      input: JSON.stringify(spec),
    })

    if (result.exitCode !== 0) {
      const tail = result.stderr.trim().split('\n').slice(-3).join('\n')
      throw new Error(tail || `python exited with code ${result.exitCode}`)
    }
    console.warn(`[RENDER] ${spec.kind} chart written in ${Date.now() - start}ms: ${path.basename(filePath)}`)
  }
}
