/**
 * Slash command registry shared by the interaction handler and deployment
 *
 * @module commands
 */

import { CommandModule } from '../types/discord';
import * as cleanup from './files/cleanup';
import * as help from './files/help';
import * as info from './files/info';
import * as start from './files/start';
import * as stats from './files/stats';

export const commands: CommandModule[] = [start, help, info, cleanup, stats];

export function findCommand(name: string): CommandModule | undefined {
	return commands.find(command => command.data.name === name);
}
