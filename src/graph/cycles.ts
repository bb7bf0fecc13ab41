/**
 * Reachability and cycle algorithms over an adjacency map.
 *
 * All walks are iterative so deep or cyclic graphs can't exhaust the stack.
 */

/** Outgoing adjacency: vertex → targets */
export type Adjacency = ReadonlyMap<string, ReadonlySet<string>>;

const EMPTY: ReadonlySet<string> = new Set();

function successors(adjacency: Adjacency, vertex: string): ReadonlySet<string> {
  return adjacency.get(vertex) ?? EMPTY;
}

/**
 * Breadth-first reachability check: is `to` reachable from `from`?
 * A vertex always reaches itself.
 */
export function isReachable(adjacency: Adjacency, from: string, to: string): boolean {
  if (from === to) return true;

  const visited = new Set<string>([from]);
  const queue: string[] = [from];

  for (let head = 0; head < queue.length; head++) {
    for (const next of successors(adjacency, queue[head])) {
      if (next === to) return true;
      if (!visited.has(next)) {
        visited.add(next);
        queue.push(next);
      }
    }
  }
  return false;
}

/**
 * Shortest cycle through `start`, as the vertex sequence beginning at start
 * (the closing edge back to start is implied). Null when start is on no cycle.
 */
export function shortestCycleThrough(adjacency: Adjacency, start: string): string[] | null {
  const parent = new Map<string, string>();
  const queue: string[] = [];

  for (const next of successors(adjacency, start)) {
    if (next === start) return [start];
    if (!parent.has(next)) {
      parent.set(next, start);
      queue.push(next);
    }
  }

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    for (const next of successors(adjacency, current)) {
      if (next === start) {
        const path: string[] = [];
        let step: string | undefined = current;
        while (step !== undefined && step !== start) {
          path.push(step);
          step = parent.get(step);
        }
        path.push(start);
        return path.reverse();
      }
      if (!parent.has(next)) {
        parent.set(next, current);
        queue.push(next);
      }
    }
  }
  return null;
}

interface Frame {
  vertex: string;
  pending: Iterator<string>;
}

/**
 * Strongly connected components (iterative Tarjan).
 *
 * Vertices appearing only as targets are included. Components are returned
 * in completion order, each in stack-pop order.
 */
export function stronglyConnectedComponents(adjacency: Adjacency): string[][] {
  let counter = 0;
  const index = new Map<string, number>();
  const lowlink = new Map<string, number>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];

  const low = (vertex: string): number => lowlink.get(vertex) ?? 0;

  for (const root of adjacency.keys()) {
    if (index.has(root)) continue;

    const work: Frame[] = [];
    const enter = (vertex: string): void => {
      index.set(vertex, counter);
      lowlink.set(vertex, counter);
      counter++;
      stack.push(vertex);
      onStack.add(vertex);
      work.push({ vertex, pending: successors(adjacency, vertex).values() });
    };

    enter(root);

    while (work.length > 0) {
      const frame = work[work.length - 1];
      const next = frame.pending.next();

      if (!next.done) {
        const target = next.value;
        const targetIndex = index.get(target);
        if (targetIndex === undefined) {
          enter(target);
        } else if (onStack.has(target)) {
          lowlink.set(frame.vertex, Math.min(low(frame.vertex), targetIndex));
        }
        continue;
      }

      work.pop();
      const parent = work[work.length - 1];
      if (parent) {
        lowlink.set(parent.vertex, Math.min(low(parent.vertex), low(frame.vertex)));
      }

      if (low(frame.vertex) === index.get(frame.vertex)) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.vertex);
        components.push(component);
      }
    }
  }

  return components;
}

/**
 * Cycles as strongly connected components with more than one vertex.
 * Each cycle is sorted; cycles are ordered by their first vertex.
 */
export function findCycles(adjacency: Adjacency): string[][] {
  return stronglyConnectedComponents(adjacency)
    .filter((component) => component.length > 1)
    .map((component) => [...component].sort())
    .sort((a, b) => a[0].localeCompare(b[0]));
}
