// dev-test/terminal.ts
//  npm run terminal
// Local, trusted driver for the same operations the HTTP API exposes.
import readline from 'readline';
import dotenv from 'dotenv';
import { loadConfig } from '../config';
import { makeServices, loadSnapshot } from '../lib/services';
import { debatesForTeam, formatLabel, missingSubmissions, openDebatesForTeam, scheduleBoard } from '../core/query';
import { forcePosition, submitPosition } from '../core/submit';
import { clockDiagnostics, scheduleDiagnostics } from '../core/diagnostics';
import { isPosition } from '../core/types';

dotenv.config();

const services = makeServices(loadConfig());

const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

// simple promise wrapper for readline.question
const ask = (q: string) =>
  new Promise<string>(res => rl.question(q, a => res(a)));

const HELP = `Commands:
  schedule [team]                                 # full schedule, optionally one team
  find TEAM                                       # slots held by a team, open ones marked *
  submit ID For|Against TEAM                      # student sign-up (deadline enforced)
  missing                                         # past-deadline slots with no submission
  override ID For|Against STAKEHOLDER | TEAM      # instructor override (no deadline)
  diag                                            # schedule sanity check + clock
  reset                                           # delete all submissions (asks twice)
  quit`;

async function showSchedule(team?: string) {
  const snap = await loadSnapshot(services);
  for (const row of scheduleBoard(snap, services.now(), team)) {
    console.log(`#${row.debateId}  ${row.dateTime}  ${row.resolution}`);
    row.slots.forEach((s, i) => {
      if (!s.team && !s.stakeholder) return;
      console.log(`   ${i + 1}. ${s.stakeholder || '?'} / ${s.team || '—'}: ${formatLabel(s.label, services.policy.timezone)}`);
    });
  }
}

async function showTeam(team: string) {
  const snap = await loadSnapshot(services);
  const all = debatesForTeam(snap.schedule, team);
  if (all.length === 0) {
    console.log('Team name not found. Please check the spelling and try again.');
    return;
  }
  const open = new Set(openDebatesForTeam(snap, team, services.now()).map(a => `${a.debate.debateId}:${a.stakeholder}`));
  for (const a of all) {
    const mark = open.has(`${a.debate.debateId}:${a.stakeholder}`) ? '*' : ' ';
    console.log(`${mark} #${a.debate.debateId} ${a.stakeholder}: ${a.debate.resolution.slice(0, 70)}`);
  }
}

function parseArgs(rest: string[]) {
  const debateId = Number(rest[0]);
  const position = rest[1] ?? '';
  if (!Number.isInteger(debateId) || debateId <= 0) throw new Error(`Bad debate id '${rest[0] ?? ''}'`);
  if (!isPosition(position)) throw new Error(`Position must be For or Against, got '${position}'`);
  return { debateId, position, tail: rest.slice(2).join(' ') };
}

async function showDiagnostics() {
  const snap = await loadSnapshot(services);
  const issues = scheduleDiagnostics(snap.schedule, services.policy);
  if (issues.length === 0) console.log('All debate dates have a matching reveal date.');
  issues.forEach(i => console.log(`!! #${i.debateId}: ${i.message}`));

  const clock = clockDiagnostics(services.policy, services.now());
  console.log(`Current app time: ${clock.now}`);
  clock.reveals.forEach(r => console.log(`  ${r.key} -> ${r.revealAt} (${r.beforeReveal ? 'hidden' : 'revealed'})`));
}

rl.on('line', async (line) => {
  const [cmd, ...rest] = line.trim().split(/\s+/);
  try {
    if (cmd === 'help') {
      console.log(HELP);

    } else if (cmd === 'schedule') {
      await showSchedule(rest.join(' ') || undefined);

    } else if (cmd === 'find') {
      await showTeam(rest.join(' '));

    } else if (cmd === 'submit') {
      const { debateId, position, tail } = parseArgs(rest);
      const snap = await loadSnapshot(services);
      const { stakeholder } = await submitPosition(
        { schedule: snap.schedule, policy: services.policy, store: services.store },
        { teamName: tail, debateId, position },
        services.now,
      );
      console.log(`OK: ${tail} (${stakeholder}) locked in ${position} for debate #${debateId}.`);

    } else if (cmd === 'missing') {
      const missing = missingSubmissions(await loadSnapshot(services), services.now());
      if (missing.length === 0) console.log('No missing submissions.');
      missing.forEach(m => console.log(`D${m.debateId}: ${m.teamName} (${m.stakeholder})`));

    } else if (cmd === 'override') {
      const { debateId, position, tail } = parseArgs(rest);
      const [stakeholder = '', teamName = ''] = tail.split('|').map(s => s.trim());
      if (!stakeholder || !teamName) throw new Error('Usage: override ID For|Against STAKEHOLDER | TEAM');
      await forcePosition(services.store, { debateId, stakeholder, teamName, position });
      console.log('Position assigned.');

    } else if (cmd === 'diag') {
      await showDiagnostics();

    } else if (cmd === 'reset') {
      const sure = (await ask('This will delete all submissions and cannot be undone. Type "delete" to continue: ')).trim();
      if (sure !== 'delete') {
        console.log('Reset cancelled.');
      } else {
        const { token } = services.resetGuard.acknowledge();
        const n = await services.resetGuard.confirm(token);
        console.log(`All submissions have been deleted (${n}).`);
      }

    } else if (cmd === 'quit') {
      rl.close(); process.exit(0);

    } else if (cmd) {
      console.log('Unknown command. Type "help".');
    }
  } catch (e) {
    console.error('ERR:', e instanceof Error ? e.message : String(e));
  }
  rl.prompt();
});

console.log(`Schedule: ${services.config.scheduleFile}`);
console.log(`Type 'help' for commands.`);
rl.prompt();
