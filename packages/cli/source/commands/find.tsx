import { Box, Text } from "ink";
import { useEffect, useState } from "react";
import zod from "zod";
import {
	SAMPLE_TREE_ID,
	buildSampleForest,
	describeFailure,
	findLine,
	parsePath,
} from "../demo.js";

export const description =
	"Resolve a slash-separated path of node values from the root of the sample release plan";

export const options = zod.object({
	path: zod
		.string()
		.describe("Path below the root, e.g. backend/storage/migrations"),
});

type Props = {
	options: zod.infer<typeof options>;
};

export default function Find({ options }: Props) {
	const [line, setLine] = useState<string | null>(null);
	const [error, setError] = useState<string | null>(null);

	useEffect(() => {
		try {
			const tree = buildSampleForest().get(SAMPLE_TREE_ID);
			setLine(findLine(tree, parsePath([options.path])));
		} catch (err) {
			setError(describeFailure(err, "find", { path: options.path }));
		}
	}, [options.path]);

	useEffect(() => {
		if (line || error) {
			setTimeout(() => {
				process.exit(error ? 1 : 0);
			}, 100);
		}
	}, [line, error]);

	if (error) return <Text color="red">Error: {error}</Text>;
	if (!line) return <Text>Searching {SAMPLE_TREE_ID}...</Text>;

	return (
		<Box flexDirection="column">
			<Text>{line}</Text>
		</Box>
	);
}
