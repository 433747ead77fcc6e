import type { FileSystem as FileSystemService } from "@effect/platform/FileSystem"
import { FileSystem } from "@effect/platform/FileSystem"
import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Effect from "effect/Effect"
import { pipe } from "effect/Function"

import type { AppError } from "../core/errors.js"
import { fileError, modelError } from "../core/errors.js"
import type {
  DependencyDecl,
  DepSpec,
  Location,
  ManifestModel,
  WorkspaceDependency,
  WorkspaceModel
} from "../core/model.js"
import { repoPath } from "../core/model.js"

// CHANGE: decode the workspace model handed over by the manifest reader
// WHY: the evaluation core only accepts a fully typed, canonicalized model
// QUOTE(TZ): "The workspace model is built by an external manifest-reading layer"
// REF: req-model-file-1
// SOURCE: n/a
// FORMAT THEOREM: ∀m: decode(m) = Right(w) → ∀p ∈ paths(w): p = repoPath(p)
// PURITY: SHELL
// EFFECT: Effect<WorkspaceModel, AppError, FileSystem>
// INVARIANT: absent flags default to false; absent publish defaults to true
// COMPLEXITY: O(n) where n = declarations

const LocationSchema = S.Struct({
  path: S.String,
  line: S.optional(S.Number.pipe(S.int(), S.positive())),
  col: S.optional(S.Number.pipe(S.int(), S.positive()))
})

const SpecSchema = S.Struct({
  version: S.optional(S.String),
  path: S.optional(S.String),
  git: S.optional(S.String),
  branch: S.optional(S.String),
  tag: S.optional(S.String),
  rev: S.optional(S.String),
  workspace: S.optional(S.Boolean),
  default_features: S.optional(S.Boolean),
  optional: S.optional(S.Boolean)
})

const DependencySchema = S.Struct({
  kind: S.Literal("normal", "dev", "build"),
  name: S.String,
  spec: SpecSchema,
  location: S.optional(LocationSchema),
  target: S.optional(S.String)
})

const ManifestSchema = S.Struct({
  path: S.String,
  package: S.optional(S.Struct({ name: S.String, publish: S.optional(S.Boolean) })),
  features: S.optional(S.Record({ key: S.String, value: S.Array(S.String) })),
  dependencies: S.optional(S.Array(DependencySchema))
})

const WorkspaceDependencySchema = S.Struct({
  version: S.optional(S.String),
  path: S.optional(S.String),
  workspace: S.optional(S.Boolean)
})

const WorkspaceSchema = S.Struct({
  root: S.optional(S.String),
  workspace_dependencies: S.optional(S.Record({ key: S.String, value: WorkspaceDependencySchema })),
  manifests: S.Array(ManifestSchema)
})

const ModelJsonSchema = S.parseJson(WorkspaceSchema)

type DecodedLocation = S.Schema.Type<typeof LocationSchema>
type DecodedSpec = S.Schema.Type<typeof SpecSchema>
type DecodedDependency = S.Schema.Type<typeof DependencySchema>
type DecodedManifest = S.Schema.Type<typeof ManifestSchema>
type DecodedWorkspace = S.Schema.Type<typeof WorkspaceSchema>

const toLocation = (location: DecodedLocation): Location => ({
  path: repoPath(location.path),
  ...(location.line === undefined ? {} : { line: location.line }),
  ...(location.col === undefined ? {} : { col: location.col })
})

const toSpec = (spec: DecodedSpec): DepSpec => ({
  ...(spec.version === undefined ? {} : { version: spec.version }),
  ...(spec.path === undefined ? {} : { path: spec.path }),
  ...(spec.git === undefined ? {} : { git: spec.git }),
  ...(spec.branch === undefined ? {} : { branch: spec.branch }),
  ...(spec.tag === undefined ? {} : { tag: spec.tag }),
  ...(spec.rev === undefined ? {} : { rev: spec.rev }),
  workspace: spec.workspace ?? false,
  ...(spec.default_features === undefined ? {} : { defaultFeatures: spec.default_features }),
  optional: spec.optional ?? false
})

const toDependency = (dep: DecodedDependency): DependencyDecl => ({
  kind: dep.kind,
  name: dep.name,
  spec: toSpec(dep.spec),
  ...(dep.location === undefined ? {} : { location: toLocation(dep.location) }),
  ...(dep.target === undefined ? {} : { target: dep.target })
})

const toManifest = (manifest: DecodedManifest): ManifestModel => ({
  path: repoPath(manifest.path),
  ...(manifest.package === undefined ? {} : {
    package: { name: manifest.package.name, publish: manifest.package.publish ?? true }
  }),
  features: manifest.features ?? {},
  dependencies: (manifest.dependencies ?? []).map(toDependency)
})

const toWorkspaceDependencies = (
  entries: DecodedWorkspace["workspace_dependencies"]
): Readonly<Record<string, WorkspaceDependency>> =>
  Object.fromEntries(
    Object.entries(entries ?? {}).map(([name, dep]) => [
      name,
      {
        name,
        ...(dep.version === undefined ? {} : { version: dep.version }),
        ...(dep.path === undefined ? {} : { path: dep.path }),
        workspace: dep.workspace ?? false
      }
    ])
  )

/**
 * Map a decoded model document onto the domain model.
 *
 * @pure true
 * @invariant manifest order is preserved
 */
export const toWorkspaceModel = (decoded: DecodedWorkspace): WorkspaceModel => ({
  root: repoPath(decoded.root ?? "."),
  workspaceDependencies: toWorkspaceDependencies(decoded.workspace_dependencies),
  manifests: decoded.manifests.map(toManifest)
})

export const decodeModel = (raw: string): Effect.Effect<WorkspaceModel, AppError> =>
  pipe(
    S.decodeUnknown(ModelJsonSchema)(raw),
    Effect.map(toWorkspaceModel),
    Effect.mapError((error) => modelError(TreeFormatter.formatErrorSync(error)))
  )

/**
 * Read and decode the workspace model file.
 *
 * @param path - Model JSON path.
 *
 * @pure false
 * @effect FileSystem
 */
export const loadModelFile = (path: string): Effect.Effect<WorkspaceModel, AppError, FileSystemService> =>
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem)
    const contents = yield* _(
      fs.readFileString(path).pipe(
        Effect.mapError((error) => fileError(`Cannot read workspace model ${path}: ${String(error)}`))
      )
    )
    return yield* _(decodeModel(contents))
  })
