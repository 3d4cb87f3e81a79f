import test from "node:test";
import assert from "node:assert/strict";
import { ballotFromRanking, type RankingEntry } from "../../src/core/ballot";
import { CandidateSetMismatch, EmptyBallotSet, InvalidBallot } from "../../src/core/errors";
import { marginOf, pairwiseComparison, resolveVote, tallyBallots, type Ballot } from "../../src/core/voting";

function ballots(universe: string[], rankings: RankingEntry[][]): Ballot[] {
  return rankings.map((ranking, index) => ballotFromRanking(`voter-${index + 1}`, ranking, universe));
}

function repeat<T>(count: number, value: T): T[] {
  return Array.from({ length: count }, () => value);
}

test("a candidate that beats every other head-to-head wins without cycle breaking", () => {
  const result = resolveVote(
    ballots(["a", "b", "c"], [
      ["a", "b", "c"],
      ["a", "c", "b"],
      ["b", "a", "c"]
    ])
  );
  assert.equal(result.winner, "a");
  assert.equal(result.condorcetWinner, "a");
  assert.equal(result.cycleBroken, false);
  assert.equal(result.criterion, "wins");
  assert.deepEqual(result.ranking, ["a", "b", "c"]);
  assert.deepEqual(result.smithSet, ["a"]);
  assert.equal(result.ballotCount, 3);
});

test("a three-way cycle is broken by Copeland score and then by smallest id", () => {
  const result = resolveVote(
    ballots(["hiking", "museum", "cinema"], [
      ["hiking", "museum", "cinema"],
      ["museum", "cinema", "hiking"],
      ["cinema", "hiking", "museum"]
    ])
  );
  assert.equal(result.winner, "cinema");
  assert.equal(result.condorcetWinner, null);
  assert.equal(result.cycleBroken, true);
  assert.equal(result.criterion, "copeland");
  assert.deepEqual(result.ranking, ["cinema", "hiking", "museum"]);
  assert.deepEqual(
    result.standings.map((standing) => [standing.candidateId, standing.copelandScore, standing.marginLost]),
    [
      ["cinema", 0, 1],
      ["hiking", 0, 1],
      ["museum", 0, 1]
    ]
  );
  assert.deepEqual(result.smithSet, ["cinema", "hiking", "museum"]);
});

test("the abstract three-ballot cycle resolves to the lexicographically smallest id", () => {
  const result = resolveVote(
    ballots(["A", "B", "C"], [
      ["A", "B", "C"],
      ["B", "C", "A"],
      ["C", "A", "B"]
    ])
  );
  assert.equal(result.winner, "A");
  assert.equal(result.cycleBroken, true);
});

test("Copeland ties are broken by the smallest total losing margin", () => {
  const result = resolveVote(
    ballots(["x", "y", "z"], [
      ...repeat<RankingEntry[]>(3, ["z", "x", "y"]),
      ...repeat<RankingEntry[]>(2, ["x", "y", "z"]),
      ...repeat<RankingEntry[]>(2, ["y", "z", "x"])
    ])
  );
  assert.equal(result.cycleBroken, true);
  assert.equal(result.winner, "z");
  assert.deepEqual(result.ranking, ["z", "x", "y"]);
  assert.deepEqual(
    result.standings.map((standing) => standing.marginLost),
    [1, 3, 3]
  );
});

test("tied ballot positions count for neither side", () => {
  const tally = tallyBallots(
    ballots(["a", "b", "c"], [
      [["a", "b"], "c"],
      ["c", "a", "b"]
    ])
  );
  assert.deepEqual(pairwiseComparison(tally, "a", "b"), {
    candidateA: "a",
    candidateB: "b",
    votesForA: 1,
    votesForB: 0,
    tied: 1,
    margin: 1,
    winner: "a"
  });
  assert.equal(marginOf(tally, "c", "a"), 0);
  assert.equal(pairwiseComparison(tally, "c", "a").winner, null);
});

test("an all-tied vote still returns a deterministic winner", () => {
  const result = resolveVote(ballots(["b", "a"], [[["a", "b"]], [["a", "b"]]]));
  assert.equal(result.winner, "a");
  assert.equal(result.condorcetWinner, null);
  assert.equal(result.cycleBroken, true);
  assert.deepEqual(result.smithSet, ["a", "b"]);
});

test("a single candidate wins outright", () => {
  const result = resolveVote(ballots(["museum"], [["museum"]]));
  assert.equal(result.winner, "museum");
  assert.equal(result.cycleBroken, false);
});

test("resolution is deterministic for identical ballots", () => {
  const input = ballots(["p", "q", "r", "s"], [
    ["p", "q", "r", "s"],
    ["q", "r", "s", "p"],
    ["r", "s", "p", "q"],
    ["s", "p", "q", "r"]
  ]);
  assert.deepEqual(resolveVote(input), resolveVote(input));
});

test("the Smith set excludes candidates beaten by the top cycle", () => {
  const result = resolveVote(
    ballots(["a", "b", "c", "d"], [
      ["a", "b", "c", "d"],
      ["b", "c", "a", "d"],
      ["c", "a", "b", "d"]
    ])
  );
  assert.equal(result.cycleBroken, true);
  assert.deepEqual(result.smithSet, ["a", "b", "c"]);
  assert.equal(result.ranking[3], "d");
});

test("candidate ids that collide with object built-ins are tallied like any other id", () => {
  const universe = ["__proto__", "a", "constructor"];
  const result = resolveVote(
    ballots(universe, [
      ["__proto__", "a", "constructor"],
      ["a", "__proto__", "constructor"],
      ["__proto__", "constructor", "a"]
    ])
  );
  assert.equal(result.winner, "__proto__");
  assert.equal(result.condorcetWinner, "__proto__");
  assert.deepEqual(result.ranking, ["__proto__", "a", "constructor"]);
  assert.deepEqual(result.smithSet, ["__proto__"]);
  assert.equal(marginOf(result.tally, "__proto__", "a"), 1);
});

test("voting rejects an empty ballot set", () => {
  assert.throws(() => resolveVote([]), EmptyBallotSet);
});

test("voting rejects ballots over different candidate sets", () => {
  const mixed = [
    ballotFromRanking("voter-1", ["a", "b"], ["a", "b"]),
    ballotFromRanking("voter-2", ["a", "c"], ["a", "c"])
  ];
  assert.throws(
    () => resolveVote(mixed),
    (error: unknown) => error instanceof CandidateSetMismatch && error.issues[0]?.field === "ballots.1.candidateIds"
  );
});

test("voting rejects ballots whose tiers do not cover their candidates", () => {
  const broken: Ballot = { voterId: "voter-1", candidateIds: ["a", "b"], tiers: [["a"]] };
  assert.throws(() => resolveVote([broken]), InvalidBallot);
});
