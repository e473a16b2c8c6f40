import { Box, Text } from "ink";
import type { RunContext } from "../core/types.js";
import { COLUMNS, type JobRow, columnWidths, formatTitle } from "./format.js";

export type MatrixViewProps = {
	context: RunContext;
	rows: JobRow[];
	showCommands?: boolean;
};

export function MatrixView({ context, rows, showCommands = false }: MatrixViewProps): JSX.Element {
	const widths = columnWidths(rows);

	return (
		<Box flexDirection="column" borderStyle="round" paddingX={2} paddingY={1}>
			<Text bold>{formatTitle(context, rows.length)}</Text>
			<Box>
				{COLUMNS.map((column) => (
					<Box key={column} width={widths[column] + 2}>
						<Text dimColor>{column.toUpperCase()}</Text>
					</Box>
				))}
			</Box>
			{rows.map((row) => (
				<Box key={row.id} flexDirection="column">
					<Box>
						<Box width={widths.name + 2}>
							<Text>{row.name}</Text>
						</Box>
						<Box width={widths.image + 2}>
							<Text color="cyan">{row.image}</Text>
						</Box>
						<Box width={widths.flags + 2}>
							<Text color={row.flags === "-" ? undefined : "yellow"}>{row.flags}</Text>
						</Box>
						<Box width={widths.env + 2}>
							<Text dimColor={row.env === "-"}>{row.env}</Text>
						</Box>
					</Box>
					{showCommands ? <Text dimColor>  {row.command}</Text> : null}
				</Box>
			))}
		</Box>
	);
}
