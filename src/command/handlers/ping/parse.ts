export type PingStats = {
	rtt_min_ms: number;
	rtt_avg_ms: number;
	rtt_max_ms: number;
	rtt_mdev_ms: number;
	packet_loss_pct: number;
};

/** Stands in for any statistic missing from the output. */
export const MISSING_STAT = -1.0;

const RTT_REG_EXP = /(?:rtt|round-trip) [a-z/]* = (?<min>[\d.]+)\/(?<avg>[\d.]+)\/(?<max>[\d.]+)\/(?<mdev>[\d.]+) ms/;
const LOSS_REG_EXP = /, (?<loss>[\d.]+)% packet loss/m;

const toStat = (value: string | undefined): number => {
	const parsed = Number.parseFloat(value ?? '');
	return Number.isFinite(parsed) ? parsed : MISSING_STAT;
};

/**
 * Extracts summary statistics from `ping` output. Any figure that cannot be
 * found is reported as -1 so that every key is always present.
 */
export default function parse (rawOutput: string): PingStats {
	const rtt = RTT_REG_EXP.exec(rawOutput)?.groups;
	const loss = LOSS_REG_EXP.exec(rawOutput)?.groups;

	return {
		rtt_min_ms: toStat(rtt?.['min']),
		rtt_avg_ms: toStat(rtt?.['avg']),
		rtt_max_ms: toStat(rtt?.['max']),
		rtt_mdev_ms: toStat(rtt?.['mdev']),
		packet_loss_pct: toStat(loss?.['loss']),
	};
}
