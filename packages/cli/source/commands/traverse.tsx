import { TRAVERSAL_ORDERS } from "@grovekit/core";
import { Box, Text } from "ink";
import { useEffect, useState } from "react";
import zod from "zod";
import {
	SAMPLE_TREE_ID,
	buildSampleForest,
	describeFailure,
	traversalLines,
} from "../demo.js";

export const description =
	"Walk the sample release plan in any traversal order, printing each node's handle and content";

export const options = zod.object({
	order: zod
		.enum(TRAVERSAL_ORDERS)
		.default("preDfs")
		.describe(`Traversal order: ${TRAVERSAL_ORDERS.join(", ")}`),
	start: zod
		.number()
		.int()
		.min(0)
		.optional()
		.describe("Handle to start from (default: the strategy's own start)"),
});

type Props = {
	options: zod.infer<typeof options>;
};

export default function Traverse({ options }: Props) {
	const [lines, setLines] = useState<string[] | null>(null);
	const [error, setError] = useState<string | null>(null);

	useEffect(() => {
		try {
			const tree = buildSampleForest().get(SAMPLE_TREE_ID);
			setLines(traversalLines(tree, options.order, options.start));
		} catch (err) {
			setError(
				describeFailure(err, "traverse", {
					order: options.order,
					start: options.start,
				}),
			);
		}
	}, [options.order, options.start]);

	useEffect(() => {
		if (lines || error) {
			setTimeout(() => {
				process.exit(error ? 1 : 0);
			}, 100);
		}
	}, [lines, error]);

	if (error) return <Text color="red">Error: {error}</Text>;
	if (!lines) return <Text>Walking {SAMPLE_TREE_ID}...</Text>;

	return (
		<Box flexDirection="column">
			<Text bold color="cyan">
				{options.order} over {SAMPLE_TREE_ID}
				{options.start === undefined ? "" : ` from #${options.start}`}
			</Text>
			{lines.length === 0 ? (
				<Text color="gray">No nodes visited</Text>
			) : (
				lines.map((line) => <Text key={line}>{line}</Text>)
			)}
		</Box>
	);
}
