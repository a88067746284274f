export const DEFAULT_EXPLORATION_WEIGHT = 1.41;

/**
 * UCT value of a child. Only meaningful for visited nodes; callers must not
 * pass visitCount 0. A parent with fewer than one visit contributes no
 * exploration bonus.
 */
export function uctValue(
  cumulativeScore: number,
  visitCount: number,
  parentVisitCount: number,
  explorationWeight: number
): number {
  const mean = cumulativeScore / visitCount;
  const logParent = Math.log(Math.max(1, parentVisitCount));
  return mean + explorationWeight * Math.sqrt((2 * logParent) / visitCount);
}

export class SearchNode<S> {
  readonly state: S | null;
  readonly parent: SearchNode<S> | null;
  readonly children: SearchNode<S>[] = [];
  visitCount = 0;
  cumulativeScore = 0;
  selectionValue = 0;
  private readonly explorationWeight: number;
  private expanded = false;

  constructor(state: S | null, parent: SearchNode<S> | null = null, explorationWeight: number = DEFAULT_EXPLORATION_WEIGHT) {
    this.state = state;
    this.parent = parent;
    this.explorationWeight = explorationWeight;
  }

  get isExpanded(): boolean {
    return this.expanded;
  }

  get isLeaf(): boolean {
    return this.children.length === 0;
  }

  get meanScore(): number {
    return this.visitCount === 0 ? 0 : this.cumulativeScore / this.visitCount;
  }

  /**
   * Creates one child per candidate, in input order. A node is expanded at
   * most once, even when the candidate list is empty.
   */
  expand(candidates: readonly S[]): SearchNode<S>[] {
    if (this.expanded) {
      throw new Error('SearchNode has already been expanded');
    }
    this.expanded = true;
    for (const candidate of candidates) {
      this.children.push(new SearchNode<S>(candidate, this, this.explorationWeight));
    }
    return this.children;
  }

  /** Records one simulation result on this node only. */
  update(score: number): void {
    this.visitCount += 1;
    this.cumulativeScore += score;
    if (this.parent) {
      this.selectionValue = uctValue(this.cumulativeScore, this.visitCount, this.parent.visitCount, this.explorationWeight);
    }
  }

  /**
   * Visited child with the highest UCT value against this node's current
   * visit count; the first one wins a tie. Null when no child has been
   * visited yet.
   */
  selectBestChild(explorationWeight: number = this.explorationWeight): SearchNode<S> | null {
    let best: SearchNode<S> | null = null;
    for (const child of this.children) {
      if (child.visitCount === 0) continue;
      child.selectionValue = uctValue(child.cumulativeScore, child.visitCount, this.visitCount, explorationWeight);
      if (best === null || child.selectionValue > best.selectionValue) {
        best = child;
      }
    }
    return best;
  }

  depth(): number {
    let depth = 0;
    let current = this.parent;
    while (current) {
      depth += 1;
      current = current.parent;
    }
    return depth;
  }

  /** This node followed by every ancestor up to the root. */
  pathToRoot(): SearchNode<S>[] {
    const path: SearchNode<S>[] = [];
    let current: SearchNode<S> | null = this;
    while (current) {
      path.push(current);
      current = current.parent;
    }
    return path;
  }

  countNodes(): number {
    let count = 0;
    const stack: SearchNode<S>[] = [this];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      count += 1;
      stack.push(...node.children);
    }
    return count;
  }
}
