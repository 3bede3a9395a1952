import type { Command } from "./base";
import addCandidate from "./add-candidate";
import biggestShifts from "./biggest-shifts";
import candidate from "./candidate";
import closestRaces from "./closest-races";
import createElection from "./create-election";
import createRace from "./create-race";
import deleteRace from "./delete-race";
import enterBallots from "./enter-ballots";
import enterResults from "./enter-results";
import partyControl from "./party-control";
import results from "./results";
import turnout from "./turnout";

export const commands: Command[] = [
    createElection,
    createRace,
    addCandidate,
    enterResults,
    enterBallots,
    results,
    turnout,
    closestRaces,
    partyControl,
    biggestShifts,
    candidate,
    deleteRace,
];

export type { BotContext, Command } from "./base";
