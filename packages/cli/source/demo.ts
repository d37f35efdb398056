import {
	Forest,
	type Handle,
	type Logger,
	type ReadonlyTree,
	type SlugTreeId,
	type TraversalOrder,
	type Tree,
	type WeightedContent,
	createModuleLogger,
	logError,
	slugTreeIdCodec,
	validateTree,
	weightedCodec,
	wrapError,
} from "@grovekit/core";

const cliLogger = createModuleLogger("cli");

/**
 * Outline of a sample tree: raw weighted content and its children
 */
export interface SampleNode {
	raw: string;
	children?: SampleNode[];
}

export type SampleForest = Forest<SlugTreeId, WeightedContent>;

export interface DemoSection {
	title: string;
	lines: string[];
}

export const SAMPLE_TREE_ID = "release-plan";

export const SAMPLE_TREES: Record<string, SampleNode> = {
	[SAMPLE_TREE_ID]: {
		raw: "10:release",
		children: [
			{
				raw: "5:backend",
				children: [
					{ raw: "3:api" },
					{ raw: "2:storage", children: [{ raw: "1:migrations" }] },
				],
			},
			{
				raw: "4:frontend",
				children: [{ raw: "2:editor" }, { raw: "2:preview" }],
			},
		],
	},
	"reading-list": {
		raw: "3:reading",
		children: [{ raw: "2:fiction" }, { raw: "1:essays" }],
	},
};

/**
 * Link a sample outline into an empty tree, level by level, so handles
 * follow breadth-first order
 */
export function populateTree(tree: Tree<WeightedContent>, sample: SampleNode): void {
	const queue: Array<[SampleNode, Handle]> = [[sample, tree.setRoot(sample.raw)]];

	for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
		const [node, handle] = entry;
		for (const child of node.children ?? []) {
			queue.push([child, tree.link(child.raw, handle)]);
		}
	}
}

export function buildSampleForest(): SampleForest {
	const forest = new Forest(slugTreeIdCodec, weightedCodec);
	for (const [id, sample] of Object.entries(SAMPLE_TREES)) {
		populateTree(forest.create(id), sample);
	}
	return forest;
}

/**
 * Sum of the weights of every node reachable from `start`
 */
export function subtreeWeight(tree: ReadonlyTree<WeightedContent>, start: Handle = 0): number {
	let total = 0;
	for (const [node] of tree.iterators(start).preDfs()) {
		total += node.content.weight;
	}
	return total;
}

export function outlineLines(tree: ReadonlyTree<WeightedContent>): string[] {
	return tree.isEmpty ? [] : tree.render().split("\n");
}

/**
 * One `#<handle> <content>` line per node, in the requested order
 */
export function traversalLines(
	tree: ReadonlyTree<WeightedContent>,
	order: TraversalOrder,
	start?: Handle,
): string[] {
	return Array.from(
		tree.iterators(start).byOrder(order),
		([node, handle]) => `#${handle} ${node.content.serialize()}`,
	);
}

/**
 * Split path arguments on `/` and drop empty segments
 */
export function parsePath(parts: readonly string[]): string[] {
	return parts.flatMap((part) => part.split("/")).filter((segment) => segment.length > 0);
}

export function findLine(tree: ReadonlyTree<WeightedContent>, path: readonly string[]): string {
	const location = `/${path.join("/")}`;
	const handle = tree.findPath(0, path);
	const node = handle === undefined ? undefined : tree.node(handle);
	if (handle === undefined || !node) {
		return `No node at ${location}`;
	}
	return `${location} -> #${handle} ${node.content.serialize()} (level ${node.level})`;
}

/**
 * Outline every sample tree, then edit the release plan and show the result
 */
export function runDemo(forest: SampleForest = buildSampleForest()): DemoSection[] {
	const sections: DemoSection[] = [];
	const trees = Array.from(forest).sort(([a], [b]) => a.id.localeCompare(b.id));

	for (const [id, tree] of trees) {
		sections.push({
			title: `${id.id} (${tree.nodeCount} nodes, weight ${subtreeWeight(tree)})`,
			lines: outlineLines(tree),
		});
	}

	const plan = forest.getMut(SAMPLE_TREE_ID);
	const frontend = plan.findPath(0, ["frontend"]);
	const storage = plan.findPath(0, ["backend", "storage"]);
	const edits: string[] = [];

	if (frontend !== undefined) {
		plan.updateContent("8:ui", frontend);
		edits.push(`updateContent #${frontend} -> 8:ui`);
	}
	if (storage !== undefined) {
		plan.unlink(storage);
		edits.push(`unlink #${storage}`);
	}

	const { warnings } = validateTree(plan);
	sections.push({
		title: `${SAMPLE_TREE_ID} after edits (weight ${subtreeWeight(plan)})`,
		lines: [
			...edits,
			...outlineLines(plan),
			...warnings.map((warning) => `warning: ${warning.message}`),
		],
	});

	return sections;
}

/**
 * Log a command failure with its context and return the message to show
 */
export function describeFailure(
	error: unknown,
	command: string,
	context: Record<string, unknown> = {},
	logger: Logger = cliLogger,
): string {
	const wrapped = wrapError(error, "cli", command, context);
	logError(logger, wrapped, { command });
	return wrapped.message;
}
