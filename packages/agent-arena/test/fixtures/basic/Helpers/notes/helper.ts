// Not an adapter module: discovery only loads agent.* files
export const note = "helpers are ignored";
