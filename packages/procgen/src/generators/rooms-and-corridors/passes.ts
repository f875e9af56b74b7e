/**
 * Rooms-and-Corridors Generator Passes
 *
 * One pass per state of the generator. Each takes the level state, moves it
 * forward and hands it on, or ends the attempt with a LevelError.
 */

import { Err, LevelError, Ok } from "@delve/contracts";
import { DisjointSet } from "../../core/algorithms/disjoint-set";
import { LevelGrid } from "../../level/level-grid";
import { carveCorridor, widenCorridors } from "../../passes/carving/corridor-carver";
import {
  type ConnectionStrategy,
  estimateCorridorTiles,
  sortedEdgeStrategy,
} from "../../passes/connectivity/room-connector";
import { placeRooms } from "../../passes/placement/room-placer";
import {
  type Corridor,
  createLevelStateArtifact,
  type EmptyArtifact,
  type LevelStateArtifact,
  type Pass,
} from "../../pipeline/types";
import { validateLevel } from "../../validation/validate-level";
import { PASS_IDS } from "./constants";

// =============================================================================
// PLACE ROOMS PASS
// =============================================================================

/**
 * Fills a fresh grid with rooms until rooms plus their expected corridors
 * reach the floor target
 */
export function placeRoomsPass(): Pass<
  EmptyArtifact,
  LevelStateArtifact,
  "placement"
> {
  return {
    id: PASS_IDS.placeRooms,
    inputType: "empty",
    outputType: "level-state",
    requiredStreams: ["placement"] as const,
    run(_input, ctx) {
      const grid = new LevelGrid(ctx.config.regionWidth, ctx.config.regionHeight);

      return placeRooms(grid, ctx.streams.placement, ctx.config, (rects) =>
        estimateCorridorTiles(rects, ctx.config),
      ).map(() => createLevelStateArtifact(grid));
    },
  };
}

// =============================================================================
// CONNECT ROOMS PASS
// =============================================================================

/**
 * Chooses which room pairs get a corridor
 */
export function connectRoomsPass(
  strategy: ConnectionStrategy = sortedEdgeStrategy,
): Pass<LevelStateArtifact, LevelStateArtifact> {
  return {
    id: PASS_IDS.connectRooms,
    inputType: "level-state",
    outputType: "level-state",
    requiredStreams: [],
    run(input, ctx) {
      const set = new DisjointSet(input.rooms.map((room) => room.id));

      return strategy
        .connect(input.rooms, set, ctx.config)
        .map((instructions) => createLevelStateArtifact(input.grid, instructions));
    },
  };
}

// =============================================================================
// CARVE CORRIDORS PASS
// =============================================================================

/**
 * Carves every instruction in order, widens corridors up to the floor
 * target, then walls in the level
 */
export function carveCorridorsPass(): Pass<
  LevelStateArtifact,
  LevelStateArtifact,
  "carving"
> {
  return {
    id: PASS_IDS.carveCorridors,
    inputType: "level-state",
    outputType: "level-state",
    requiredStreams: ["carving"] as const,
    run(input, ctx) {
      const { grid } = input;
      const corridors: Corridor[] = [];

      for (const instruction of input.instructions) {
        const from = grid.getRoom(instruction.fromRoomId);
        const to = grid.getRoom(instruction.toRoomId);
        if (!from || !to) {
          throw new Error(
            `Carving instruction names unknown room ${from ? instruction.toRoomId : instruction.fromRoomId}`,
          );
        }

        const carved = carveCorridor(from, to, instruction, grid, ctx.streams.carving, ctx.config);
        if (carved.isErr()) {
          return Err(carved.error);
        }

        const outcome = carved.value;
        if (!outcome.clean) {
          ctx.trace.warning(
            PASS_IDS.carveCorridors,
            `Corridor ${from.id}-${to.id} crosses ${outcome.intersections} tiles of other rooms after ${outcome.attempts} routes`,
          );
        }
        corridors.push({
          ...instruction,
          path: outcome.path,
          intersections: outcome.intersections,
        });
      }

      widenCorridors(
        grid,
        corridors.map((corridor) => corridor.path),
        grid.tileTarget(ctx.config.targetFloorRatio),
      );
      grid.outlineWalls();

      return Ok(createLevelStateArtifact(grid, input.instructions, corridors));
    },
  };
}

// =============================================================================
// VALIDATE PASS
// =============================================================================

/**
 * Ground-truth checks on the finished grid
 */
export function validatePass(): Pass<LevelStateArtifact, LevelStateArtifact> {
  return {
    id: PASS_IDS.validate,
    inputType: "level-state",
    outputType: "level-state",
    requiredStreams: [],
    run(input, ctx) {
      const validation = validateLevel(input, ctx.config);
      if (!validation.success) {
        return Err(
          LevelError.validationFailed(
            validation.violations.map((v) => v.message).join("; "),
            { violations: validation.violations },
          ),
        );
      }
      return Ok(input);
    },
  };
}
