import type { CommandInterface } from './types.js';
import { DevCommand } from './command/dev-command.js';
import { DnsLatencyCommand } from './command/dns-latency-command.js';
import { HopsCommand } from './command/hops-command.js';
import { HopsTracerouteCommand } from './command/hops-traceroute-command.js';
import { IpCommand } from './command/ip-command.js';
import { LastMileCommand } from './command/lml-command.js';
import { LastMileTracerouteCommand } from './command/lml-traceroute-command.js';
import { Ndt7Command } from './command/ndt7-command.js';
import { OoklaCommand } from './command/ookla-command.js';
import { PingCommand } from './command/ping-command.js';
import type { Settings } from './lib/config.js';
import { ConnectivityGate } from './lib/connectivity.js';
import type { ProcessRunner } from './lib/process-runner.js';

type CommandFactory = (settings: Settings, runner: ProcessRunner, gate: ConnectivityGate) => CommandInterface;

const factories = {
	'ping': (...args) => new PingCommand(...args),
	'lml': (...args) => new LastMileCommand(...args),
	'lml-traceroute': (...args) => new LastMileTracerouteCommand(...args),
	'hops': (...args) => new HopsCommand(...args),
	'hops-traceroute': (...args) => new HopsTracerouteCommand(...args),
	'dns-latency': (...args) => new DnsLatencyCommand(...args),
	'ookla': (...args) => new OoklaCommand(...args),
	'ndt7': (...args) => new Ndt7Command(...args),
	'dev': (...args) => new DevCommand(...args),
	'ip': (...args) => new IpCommand(...args),
} satisfies Record<string, CommandFactory>;

export type TaskName = keyof typeof factories;

export const TASK_NAMES = Object.keys(factories);

export const isTaskName = (name: string): name is TaskName => Object.hasOwn(factories, name);

export const createCommand = (name: TaskName, settings: Settings, runner: ProcessRunner): CommandInterface => {
	const gate = new ConnectivityGate(settings.connectivity, runner);
	return factories[name](settings, runner, gate);
};
