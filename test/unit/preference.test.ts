import test from "node:test";
import assert from "node:assert/strict";
import { InvalidProfile } from "../../src/core/errors";
import { preferenceBreakdown, scorePreference } from "../../src/core/preference";
import { assertClose, makeHiking, makeIndoor, makeProfile } from "../fixtures";

const hiking = makeHiking();
const cycling = makeHiking({ id: "cycling", name: "Bike ride" });
const trailRun = makeHiking({ id: "trail-run", name: "Trail run" });
const cinema = makeIndoor("cinema", "Cinema");
const museum = makeIndoor("museum", "Museum visit");

test("a new user with no favorites and no history gets a neutral 0.5 everywhere", () => {
  const profile = makeProfile();
  assert.equal(scorePreference(profile, hiking), 0.5);
  assert.equal(scorePreference(profile, cinema), 0.5);
  assert.equal(preferenceBreakdown(profile, hiking).coldStart, true);
});

test("an excluded activity scores exactly 0 whatever else the profile says", () => {
  const favoriteButExcluded = makeProfile({
    favorites: { hiking: 5 },
    history: [{ activityId: "hiking", count: 10, lastSelectedAt: "2026-05-30T10:00:00Z" }],
    exclusions: ["hiking"]
  });
  assert.equal(scorePreference(favoriteButExcluded, hiking), 0);

  const coldStartExclusion = makeProfile({ exclusions: ["cinema"] });
  assert.equal(scorePreference(coldStartExclusion, cinema), 0);
  assert.equal(scorePreference(coldStartExclusion, museum), 0.5);
});

test("favorite weights are normalized against the heaviest favorite", () => {
  const profile = makeProfile({ favorites: { hiking: 4, cinema: 2 } });
  assert.equal(scorePreference(profile, hiking), 1);
  assert.equal(scorePreference(profile, cinema), 0.5);
  assert.equal(scorePreference(profile, museum), 0);
});

test("history frequency raises affinity relative to the strongest past pick", () => {
  const profile = makeProfile({
    history: [
      { activityId: "hiking", count: 3, lastSelectedAt: "2026-05-01T00:00:00Z" },
      { activityId: "cinema", count: 1, lastSelectedAt: "2026-05-01T00:00:00Z" }
    ]
  });
  assert.equal(scorePreference(profile, hiking), 1);
  assertClose(scorePreference(profile, cinema), 1 / 3);
  assert.equal(scorePreference(profile, museum), 0);
});

test("older picks decay with a thirty-day half-life", () => {
  const profile = makeProfile({
    history: [
      { activityId: "hiking", count: 1, lastSelectedAt: "2026-01-31T00:00:00Z" },
      { activityId: "cinema", count: 1, lastSelectedAt: "2026-03-02T00:00:00Z" }
    ]
  });
  assertClose(scorePreference(profile, hiking), 0.5);
  assert.equal(scorePreference(profile, cinema), 1);
  assertClose(scorePreference(profile, hiking, { halfLifeDays: 15 }), 0.25);
});

test("an explicit reference time treats later picks as brand new", () => {
  const profile = makeProfile({
    history: [
      { activityId: "hiking", count: 1, lastSelectedAt: "2026-01-01T00:00:00Z" },
      { activityId: "cinema", count: 1, lastSelectedAt: "2026-03-02T00:00:00Z" }
    ]
  });
  assertClose(scorePreference(profile, hiking), 0.25);
  assertClose(scorePreference(profile, hiking, { asOf: "2026-01-31T00:00:00Z" }), 0.5);
  assert.equal(scorePreference(profile, cinema, { asOf: "2026-01-31T00:00:00Z" }), 1);
});

test("picks of a related activity in the same category count at half strength", () => {
  const profile = makeProfile({
    history: [{ activityId: "hiking", category: "outdoor-sport", count: 2, lastSelectedAt: "2026-05-01T00:00:00Z" }]
  });
  assert.equal(scorePreference(profile, hiking), 1);
  assertClose(scorePreference(profile, trailRun), 0.5);
  assert.equal(scorePreference(profile, cinema), 0);
});

test("favorites and history blend 60/40 when both are present", () => {
  const profile = makeProfile({
    favorites: { hiking: 1 },
    history: [{ activityId: "cinema", count: 1, lastSelectedAt: "2026-05-01T00:00:00Z" }]
  });
  assertClose(scorePreference(profile, hiking), 0.6);
  assertClose(scorePreference(profile, cinema), 0.4);
  assert.equal(scorePreference(profile, cycling), 0);

  const breakdown = preferenceBreakdown(profile, hiking);
  assert.equal(breakdown.favorite, 1);
  assert.equal(breakdown.history, 0);
});

test("scores stay within [0, 1] when direct and related picks add up", () => {
  const profile = makeProfile({
    history: [
      { activityId: "hiking", category: "outdoor-sport", count: 4, lastSelectedAt: "2026-05-01T00:00:00Z" },
      { activityId: "cycling", category: "outdoor-sport", count: 4, lastSelectedAt: "2026-05-01T00:00:00Z" }
    ]
  });
  assert.equal(scorePreference(profile, hiking), 1);
  assert.equal(scorePreference(profile, trailRun), 1);
});

test("malformed profiles are rejected", () => {
  const invalid = [
    makeProfile({ favorites: { hiking: -1 } }),
    makeProfile({ favorites: { hiking: 0 } }),
    makeProfile({ favorites: { hiking: Number.NaN } }),
    makeProfile({ history: [{ activityId: "hiking", count: 0, lastSelectedAt: "2026-05-01T00:00:00Z" }] }),
    makeProfile({ history: [{ activityId: "hiking", count: 1.5, lastSelectedAt: "2026-05-01T00:00:00Z" }] }),
    makeProfile({ history: [{ activityId: "hiking", count: 1, lastSelectedAt: "yesterday-ish" }] }),
    makeProfile({ userId: "" })
  ];
  for (const profile of invalid) {
    assert.throws(() => scorePreference(profile, hiking), InvalidProfile);
  }
});

test("an unreadable reference time is rejected", () => {
  assert.throws(() => scorePreference(makeProfile(), hiking, { asOf: "soon" }), InvalidProfile);
  assert.throws(() => scorePreference(makeProfile(), hiking, { halfLifeDays: 0 }), InvalidProfile);
});
