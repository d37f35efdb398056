import { Box, Text } from "ink";
import { useEffect, useState } from "react";
import { type DemoSection, describeFailure, runDemo } from "../demo.js";

export const description =
	"Build the sample forest, print every tree, then edit the release plan";

export default function Demo() {
	const [sections, setSections] = useState<DemoSection[]>([]);
	const [error, setError] = useState<string | null>(null);
	const [done, setDone] = useState(false);

	useEffect(() => {
		try {
			setSections(runDemo());
		} catch (err) {
			setError(describeFailure(err, "demo"));
		} finally {
			setDone(true);
		}
	}, []);

	useEffect(() => {
		if (done) {
			setTimeout(() => {
				process.exit(error ? 1 : 0);
			}, 100);
		}
	}, [done, error]);

	if (!done) return <Text>Building sample forest...</Text>;
	if (error) return <Text color="red">Error: {error}</Text>;

	return (
		<Box flexDirection="column">
			{sections.map((section) => (
				<Box key={section.title} flexDirection="column" marginBottom={1}>
					<Text bold color="cyan">
						{section.title}
					</Text>
					{section.lines.map((line, index) => (
						<Text key={`${section.title}-${index}`}>{line}</Text>
					))}
				</Box>
			))}
		</Box>
	);
}
