export type ArpEntry = {
	address: string;
	hwtype: string;
	hwaddress: string;
};

const NEW_LINE_REG_EXP = /\r?\n/;

/**
 * Reads `arp -e --numeric` output (Linux format). The header line, blank
 * lines and lines of fewer than three columns are skipped.
 */
export default function parse (rawOutput: string): ArpEntry[] {
	const entries: ArpEntry[] = [];

	for (const line of rawOutput.split(NEW_LINE_REG_EXP)) {
		if (line.trim().toLowerCase().startsWith('address')) {
			continue;
		}

		const [ address, hwtype, hwaddress ] = line.trim().split(/\s+/);

		if (address && hwtype && hwaddress) {
			entries.push({ address, hwtype, hwaddress });
		}
	}

	return entries;
}
