import { describe, expect, it } from "vitest";
import { computeInstanceKind } from "./comparators/compute-instance.js";
import { createDefaultRegistry } from "./comparators/registry.js";
import type { DriftEngineConfigInput } from "./config.js";
import { DriftDetectionEngine, declaredRegionHint, detectDrift } from "./engine.js";
import { ParseError, SnapshotShapeError } from "./errors.js";
import { MemoryTransport, createDriftLogger } from "./logging/index.js";
import { parseDeclaredState } from "./parser.js";
import type { DriftItem } from "./types.js";

/* ---------- helpers ---------- */

const NOW = new Date("2024-03-01T12:00:00.000Z");
const ISO_NOW = NOW.toISOString();
const fixedClock = () => NOW;

function managed(type: string, name: string, attributes: Record<string, unknown>) {
  return { mode: "managed", type, name, provider: 'provider["registry.terraform.io/hashicorp/aws"]', instances: [{ schema_version: 1, attributes }] };
}

function instanceAttributes(overrides: Record<string, unknown> = {}) {
  return {
    id: "i-web",
    instance_type: "t3.medium",
    ami: "ami-111",
    availability_zone: "us-east-1a",
    vpc_security_group_ids: ["sg-web"],
    tags: { Name: "web", Env: "prod" },
    ...overrides,
  };
}

function instanceRecord(overrides: Record<string, unknown> = {}) {
  return {
    InstanceId: "i-web",
    InstanceType: "t3.medium",
    ImageId: "ami-111",
    Placement: { AvailabilityZone: "us-east-1a" },
    SecurityGroups: [{ GroupId: "sg-web", GroupName: "web" }],
    State: { Code: 16, Name: "running" },
    Tags: [
      { Key: "Name", Value: "web" },
      { Key: "Env", Value: "prod" },
      { Key: "LastModified", Value: "2024-02-01" },
    ],
    ...overrides,
  };
}

const WEB_INGRESS = [
  { protocol: "tcp", from_port: 80, to_port: 80, cidr_blocks: ["0.0.0.0/0"], ipv6_cidr_blocks: [] },
  { protocol: "tcp", from_port: 443, to_port: 443, cidr_blocks: ["0.0.0.0/0"], ipv6_cidr_blocks: [] },
];

const http = { IpProtocol: "tcp", FromPort: 80, ToPort: 80, IpRanges: [{ CidrIp: "0.0.0.0/0" }] };
const https = { IpProtocol: "tcp", FromPort: 443, ToPort: 443, IpRanges: [{ CidrIp: "0.0.0.0/0" }] };
const ssh = { IpProtocol: "tcp", FromPort: 22, ToPort: 22, IpRanges: [{ CidrIp: "10.0.0.0/8" }] };

function securityGroupRecord(overrides: Record<string, unknown> = {}) {
  return {
    GroupId: "sg-web",
    GroupName: "web",
    Description: "Web traffic",
    IpPermissions: [http, https],
    Tags: [{ Key: "Name", Value: "web-sg" }],
    ...overrides,
  };
}

function bucketRecord(overrides: Record<string, unknown> = {}) {
  return {
    Name: "app-logs",
    Versioning: { Status: "Enabled" },
    Tags: [
      { Key: "Name", Value: "app-logs" },
      { Key: "BackupRetention", Value: "30-days" },
    ],
    ...overrides,
  };
}

function roleRecord(overrides: Record<string, unknown> = {}) {
  return {
    RoleName: "app-role",
    Arn: "arn:aws:iam::111122223333:role/app-role",
    Description: "Application role",
    ...overrides,
  };
}

function declaredState(extra: unknown[] = []) {
  return {
    version: 4,
    terraform_version: "1.6.0",
    serial: 3,
    lineage: "lineage-test",
    resources: [
      managed("aws_instance", "web", instanceAttributes()),
      managed("aws_security_group", "web", {
        id: "sg-web",
        name: "web",
        description: "Web traffic",
        ingress: WEB_INGRESS,
        tags: { Name: "web-sg" },
      }),
      managed("aws_s3_bucket", "logs", {
        id: "app-logs",
        bucket: "app-logs",
        versioning: [{ enabled: true, mfa_delete: false }],
        tags: { Name: "app-logs", BackupRetention: "30-days" },
      }),
      managed("aws_iam_role", "app", {
        name: "app-role",
        arn: "arn:aws:iam::111122223333:role/app-role",
        description: "Application role",
        tags: {},
      }),
      ...extra,
    ],
  };
}

function liveSnapshot(east: Record<string, unknown> = {}, west: Record<string, unknown> = {}) {
  return {
    "us-east-1": {
      region: "us-east-1",
      ec2_instances: [instanceRecord()],
      security_groups: [securityGroupRecord()],
      s3_buckets: [bucketRecord()],
      iam_roles: [roleRecord()],
      ...east,
    },
    "us-west-2": {
      region: "us-west-2",
      ec2_instances: [],
      iam_roles: [roleRecord()],
      ...west,
    },
    scan_time: "2024-03-01T11:59:00Z",
  };
}

function makeEngine(config: DriftEngineConfigInput = {}, registry = createDefaultRegistry()) {
  const memory = new MemoryTransport();
  const logger = createDriftLogger("test", { level: "debug", transports: [memory] });
  return { engine: new DriftDetectionEngine({ config, registry, logger }), memory };
}

function scan(state: unknown, snapshot: unknown, config: DriftEngineConfigInput = {}) {
  const { engine } = makeEngine(config);
  return engine.scan(parseDeclaredState(state), snapshot, { scanId: "scan-test", now: fixedClock });
}

function withoutTimestamps(items: DriftItem[]) {
  return items.map(({ firstDetected: _first, lastSeen: _last, ...rest }) => rest);
}

const SCRATCH_INSTANCE = {
  InstanceId: "i-scratch",
  InstanceType: "t2.micro",
  State: { Code: 80, Name: "stopped" },
  Tags: [{ Key: "Name", Value: "scratch" }],
};

/* ================================================================
   Core properties
   ================================================================ */

describe("DriftDetectionEngine", () => {
  it("reports nothing when every declared resource matches", () => {
    const result = scan(declaredState(), liveSnapshot());

    expect(result.items).toEqual([]);
    expect(result.skipped).toEqual([]);
    expect(result.shapeIssues).toEqual([]);
  });

  it("fills in the scan result", () => {
    const result = scan(declaredState(), liveSnapshot());

    expect(result.scanId).toBe("scan-test");
    expect(result.startedAt).toBe(ISO_NOW);
    expect(result.completedAt).toBe(ISO_NOW);
    expect(result.regions).toEqual(["us-east-1", "us-west-2"]);
    expect(result.declaredResourceCount).toBe(4);
    expect(result.liveResourceCount).toBe(5);
  });

  it("produces the same items for the same inputs", () => {
    const { engine } = makeEngine();
    const state = declaredState();
    const snapshot = liveSnapshot({ ec2_instances: [instanceRecord({ InstanceType: "t3.large" })] }, { ec2_instances: [SCRATCH_INSTANCE] });

    const first = engine.scan(state, snapshot, { now: () => new Date("2024-03-01T00:00:00.000Z") });
    const second = engine.scan(state, snapshot, { now: () => new Date("2024-03-02T00:00:00.000Z") });

    expect(first.scanId).not.toBe(second.scanId);
    expect(first.items[0]!.firstDetected).toBe("2024-03-01T00:00:00.000Z");
    expect(withoutTimestamps(second.items)).toEqual(withoutTimestamps(first.items));
  });

  it("reports a changed instance class as one configuration item", () => {
    const result = scan(declaredState(), liveSnapshot({ ec2_instances: [instanceRecord({ InstanceType: "t3.large" })] }));

    expect(result.items).toEqual([
      {
        resourceType: "aws_instance",
        resourceName: "web",
        terraformAddress: "aws_instance.web",
        liveId: "i-web",
        driftType: "configuration",
        severity: "HIGH",
        differences: {
          instanceClass: {
            kind: "attribute",
            declared: "t3.medium",
            live: "t3.large",
            impact: "Performance and cost implications",
          },
        },
        firstDetected: ISO_NOW,
        lastSeen: ISO_NOW,
        environment: "production",
        region: "us-east-1",
      },
    ]);
  });

  it("reports an added ingress rule as one configuration item", () => {
    const result = scan(declaredState(), liveSnapshot({ security_groups: [securityGroupRecord({ IpPermissions: [http, https, ssh] })] }));

    expect(result.items).toHaveLength(1);
    const [item] = result.items;
    expect(item!.driftType).toBe("configuration");
    expect(item!.terraformAddress).toBe("aws_security_group.web");
    expect(Object.keys(item!.differences)).toEqual(["ingressRules"]);
    const rules = item!.differences.ingressRules;
    if (rules?.kind !== "rules") throw new Error("expected a rule difference");
    expect(rules.declared).toHaveLength(2);
    expect(rules.live).toHaveLength(3);
    expect(rules.live[0]).toEqual({ protocol: "tcp", fromPort: 22, toPort: 22, sourceCidrs: ["10.0.0.0/8"] });
  });

  it("reports a tag missing from the live bucket as one tags item", () => {
    const result = scan(
      declaredState(),
      liveSnapshot({ s3_buckets: [bucketRecord({ Tags: [{ Key: "Name", Value: "app-logs" }] })] }),
    );

    expect(result.items).toHaveLength(1);
    expect(result.items[0]).toMatchObject({
      resourceType: "aws_s3_bucket",
      terraformAddress: "aws_s3_bucket.logs",
      liveId: "app-logs",
      driftType: "tags",
      severity: "MEDIUM",
    });
    expect(result.items[0]!.differences.tags).toMatchObject({ missingInLive: { BackupRetention: "30-days" } });
  });

  it("classifies tag and attribute drift together as configuration", () => {
    const result = scan(
      declaredState(),
      liveSnapshot({ ec2_instances: [instanceRecord({ InstanceType: "t3.large", Tags: [{ Key: "Name", Value: "web" }] })] }),
    );

    expect(result.items).toHaveLength(1);
    expect(result.items[0]!.driftType).toBe("configuration");
    expect(Object.keys(result.items[0]!.differences)).toEqual(["instanceClass", "tags"]);
  });

  it("ignores changes to ignored tags", () => {
    const tags = [
      { Key: "Name", Value: "web" },
      { Key: "Env", Value: "prod" },
      { Key: "LastModified", Value: "2024-02-29" },
      { Key: "CreatedBy", Value: "someone-else" },
    ];
    const state = declaredState();
    state.resources[0] = managed("aws_instance", "web", instanceAttributes({ tags: { Name: "web", Env: "prod", CreatedBy: "ci" } }));

    expect(scan(state, liveSnapshot({ ec2_instances: [instanceRecord({ Tags: tags })] })).items).toEqual([]);
  });

  it("ignores the order of firewall rules on either side", () => {
    const state = declaredState();
    state.resources[1] = managed("aws_security_group", "web", {
      id: "sg-web",
      name: "web",
      description: "Web traffic",
      ingress: [...WEB_INGRESS].reverse(),
      tags: { Name: "web-sg" },
    });

    expect(scan(state, liveSnapshot({ security_groups: [securityGroupRecord({ IpPermissions: [https, http] })] })).items).toEqual([]);
  });
});

/* ================================================================
   Missing and extra resources
   ================================================================ */

describe("missing resources", () => {
  it("yields exactly one missing item across all regions", () => {
    const result = scan(declaredState(), liveSnapshot({ ec2_instances: [] }));

    expect(result.items).toEqual([
      {
        resourceType: "aws_instance",
        resourceName: "web",
        terraformAddress: "aws_instance.web",
        liveId: "i-web",
        driftType: "missing",
        severity: "CRITICAL",
        differences: {
          status: {
            kind: "attribute",
            declared: "present",
            live: "absent",
            impact: "EC2 instance exists in Terraform but was not found in the live environment",
          },
        },
        firstDetected: ISO_NOW,
        lastSeen: ISO_NOW,
        environment: "production",
        region: "us-east-1",
      },
    ]);
  });

  it("treats an absent collection as empty", () => {
    const snapshot = liveSnapshot();
    const { s3_buckets: _buckets, ...east } = snapshot["us-east-1"];
    const result = scan(declaredState(), { ...snapshot, "us-east-1": east });

    expect(result.items.map((item) => [item.terraformAddress, item.driftType])).toEqual([["aws_s3_bucket.logs", "missing"]]);
  });

  it("matches declared resources in the region they declare", () => {
    const state = declaredState([managed("aws_instance", "api", instanceAttributes({ id: "i-api", availability_zone: "us-west-2b" }))]);
    const api = instanceRecord({ InstanceId: "i-api", Placement: { AvailabilityZone: "us-west-2b" } });

    expect(scan(state, liveSnapshot({}, { ec2_instances: [api] })).items).toEqual([]);

    const missing = scan(state, liveSnapshot());
    expect(missing.items).toHaveLength(1);
    expect(missing.items[0]).toMatchObject({ terraformAddress: "aws_instance.api", region: "us-west-2" });
  });
});

describe("regional matching", () => {
  const FUNCTION_ARN = "arn:aws:lambda:us-east-1:111122223333:function:fn";

  function functionState(attributes: Record<string, unknown> = {}) {
    return {
      version: 4,
      resources: [
        managed("aws_lambda_function", "fn", {
          function_name: "fn",
          runtime: "nodejs20.x",
          memory_size: 128,
          timeout: 3,
          tags: {},
          ...attributes,
        }),
      ],
    };
  }

  const functionRecord = (runtime: string) => ({ FunctionName: "fn", Runtime: runtime, MemorySize: 128, Timeout: 3 });

  const twoRegions = {
    "eu-west-1": { lambda_functions: [functionRecord("python3.12")] },
    "us-east-1": { lambda_functions: [functionRecord("nodejs20.x")] },
  };

  it("pairs a resource with its counterpart in the region its ARN names", () => {
    const result = scan(functionState({ arn: FUNCTION_ARN }), twoRegions);

    expect(result.items.map((item) => [item.driftType, item.region, item.liveId])).toEqual([["extra", "eu-west-1", "fn"]]);
  });

  it("falls back to the first region holding the identifier without a hint", () => {
    const result = scan(functionState(), twoRegions);

    expect(result.items.map((item) => [item.driftType, item.region, item.liveId])).toEqual([
      ["configuration", "eu-west-1", "fn"],
      ["extra", "us-east-1", "fn"],
    ]);
    expect(result.items[0]!.differences.runtime).toMatchObject({ declared: "nodejs20.x", live: "python3.12" });
  });

  it("reports a resource missing from its own region even when another region has the identifier", () => {
    const result = scan(functionState({ arn: FUNCTION_ARN }), { "eu-west-1": twoRegions["eu-west-1"], "us-east-1": {} });

    expect(result.items.map((item) => [item.driftType, item.region, item.terraformAddress])).toEqual([
      ["missing", "us-east-1", "aws_lambda_function.fn"],
      ["extra", "eu-west-1", "N/A"],
    ]);
  });
});

describe("fields one side omits", () => {
  it("reports declared settings the live record lacks and logs the gap", () => {
    const { engine, memory } = makeEngine();
    const state = {
      version: 4,
      resources: [
        managed("aws_db_instance", "main", {
          identifier: "main-db",
          instance_class: "db.t3.micro",
          engine_version: "15.4",
          allocated_storage: 100,
          tags: {},
        }),
      ],
    };
    const snapshot = {
      "us-east-1": { rds_instances: [{ DBInstanceIdentifier: "main-db", DBInstanceClass: "db.t3.micro", EngineVersion: "15.4" }] },
    };

    const result = engine.scan(state, snapshot, { now: fixedClock });

    expect(result.items).toHaveLength(1);
    expect(result.items[0]).toMatchObject({ driftType: "configuration", liveId: "main-db", region: "us-east-1" });
    expect(result.items[0]!.differences).toEqual({
      allocatedStorage: { kind: "attribute", declared: 100, live: null, impact: "Storage capacity and cost implications" },
    });
    expect(result.shapeIssues).toEqual([
      {
        resourceType: "aws_db_instance",
        resourceId: "main-db",
        side: "live",
        field: "allocatedStorage",
        detail: "allocatedStorage is absent or unreadable; compared as null",
      },
    ]);
    expect(memory.messages("warn")).toContain("Resource shape warning on live field allocatedStorage");
  });
});

describe("extra resources", () => {
  it("yields one extra item for an undeclared live resource", () => {
    const result = scan(declaredState(), liveSnapshot({}, { ec2_instances: [SCRATCH_INSTANCE] }));

    expect(result.items).toEqual([
      {
        resourceType: "aws_instance",
        resourceName: "scratch",
        terraformAddress: "N/A",
        liveId: "i-scratch",
        driftType: "extra",
        severity: "CRITICAL",
        differences: {
          status: {
            kind: "attribute",
            declared: "absent",
            live: "present",
            impact: "EC2 instance exists in the live environment but is not managed by Terraform",
          },
          resourceDetails: {
            kind: "attribute",
            declared: null,
            live: { instanceType: "t2.micro", state: "stopped", tags: { Name: "scratch" } },
          },
        },
        firstDetected: ISO_NOW,
        lastSeen: ISO_NOW,
        environment: "production",
        region: "us-west-2",
      },
    ]);
  });

  it("skips resources tagged as managed elsewhere", () => {
    const managedElsewhere = { ...SCRATCH_INSTANCE, Tags: [{ Key: "ManagedBy", Value: "terraform" }] };
    expect(scan(declaredState(), liveSnapshot({}, { ec2_instances: [managedElsewhere] })).items).toEqual([]);

    const customTag = { ...SCRATCH_INSTANCE, Tags: [{ Key: "Owner", Value: "pulumi" }] };
    const result = scan(declaredState(), liveSnapshot({}, { ec2_instances: [customTag] }), {
      managedByTag: { key: "Owner", value: "pulumi" },
    });
    expect(result.items).toEqual([]);
  });

  it("detects extras for every resource kind", () => {
    const stray = { Name: "stray-bucket", Tags: [] };
    const result = scan(declaredState(), liveSnapshot({ s3_buckets: [bucketRecord(), stray], vpcs: [{ VpcId: "vpc-default", IsDefault: true }] }));

    expect(result.items.map((item) => [item.resourceType, item.liveId, item.resourceName])).toEqual([
      ["aws_s3_bucket", "stray-bucket", "stray-bucket"],
      ["aws_vpc", "vpc-default", "vpc-default"],
    ]);
  });

  it("supports generic kinds registered at runtime", () => {
    const registry = createDefaultRegistry();
    registry.registerGeneric({ resourceType: "aws_eip", collection: "elastic_ips", liveIdField: "AllocationId" });
    const { engine } = makeEngine({}, registry);

    const result = engine.scan(
      declaredState(),
      liveSnapshot({ elastic_ips: [{ AllocationId: "eipalloc-1", Tags: [{ Key: "Name", Value: "nat" }] }] }),
      { now: fixedClock },
    );

    expect(result.items).toHaveLength(1);
    expect(result.items[0]).toMatchObject({ resourceType: "aws_eip", liveId: "eipalloc-1", resourceName: "nat", driftType: "extra" });
    expect(result.items[0]!.differences.resourceDetails).toEqual({ kind: "attribute", declared: null, live: { tags: { Name: "nat" } } });
  });
});

/* ================================================================
   Ordering and global resources
   ================================================================ */

describe("emission order", () => {
  it("emits matched items by type in declared order, then extras", () => {
    const result = scan(
      declaredState(),
      liveSnapshot(
        {
          ec2_instances: [instanceRecord({ InstanceType: "t3.large" })],
          s3_buckets: [bucketRecord({ Tags: [] })],
        },
        { ec2_instances: [SCRATCH_INSTANCE] },
      ),
    );

    expect(result.items.map((item) => `${item.driftType}:${item.resourceType}:${item.liveId}`)).toEqual([
      "configuration:aws_instance:i-web",
      "tags:aws_s3_bucket:app-logs",
      "extra:aws_instance:i-scratch",
    ]);
  });
});

describe("global resources", () => {
  it("evaluates identity roles once, in the primary region", () => {
    const changed = roleRecord({ Description: "Edited in the console" });
    const result = scan(declaredState(), liveSnapshot({ iam_roles: [changed] }, { iam_roles: [changed, roleRecord({ RoleName: "other" })] }));

    expect(result.items).toHaveLength(1);
    expect(result.items[0]).toMatchObject({ resourceType: "aws_iam_role", region: "us-east-1", driftType: "configuration" });
  });

  it("reports a role missing from the primary region once", () => {
    const result = scan(declaredState(), liveSnapshot({ iam_roles: [] }));

    expect(result.items.map((item) => [item.terraformAddress, item.driftType, item.region])).toEqual([
      ["aws_iam_role.app", "missing", "us-east-1"],
    ]);
  });

  it("skips roles when the primary region is not in the snapshot", () => {
    const { engine, memory } = makeEngine({ primaryRegion: "eu-central-1" });
    const result = engine.scan(declaredState(), liveSnapshot(), { now: fixedClock });

    expect(result.items).toEqual([]);
    expect(result.skipped).toEqual([
      {
        reason: "out-of-scope",
        resourceType: "aws_iam_role",
        address: "aws_iam_role.app",
        liveId: "app-role",
        region: "eu-central-1",
        detail: "region eu-central-1 is not being scanned",
      },
    ]);
    expect(memory.messages("warn")).toContain(
      "Primary region eu-central-1 is not being scanned; aws_iam_role live records are not evaluated",
    );
  });
});

/* ================================================================
   Configuration
   ================================================================ */

describe("configuration", () => {
  it("skips ignored resources by live id or address", () => {
    const snapshot = liveSnapshot({ ec2_instances: [instanceRecord({ InstanceType: "t3.large" })] }, { ec2_instances: [SCRATCH_INSTANCE] });

    const byId = scan(declaredState(), snapshot, { ignoreResources: ["i-web", "i-scratch"] });
    expect(byId.items).toEqual([]);
    expect(byId.skipped).toEqual([
      { reason: "ignored", resourceType: "aws_instance", address: "aws_instance.web", liveId: "i-web", detail: "listed in ignoreResources" },
    ]);

    const byAddress = scan(declaredState(), snapshot, { ignoreResources: ["aws_instance.web"] });
    expect(byAddress.items.map((item) => item.liveId)).toEqual(["i-scratch"]);
  });

  it("restricts analysis to the configured regions", () => {
    const state = declaredState([managed("aws_instance", "api", instanceAttributes({ id: "i-api", availability_zone: "us-west-2a" }))]);
    const result = scan(state, liveSnapshot({}, { ec2_instances: [SCRATCH_INSTANCE] }), { scanRegions: ["us-east-1"] });

    expect(result.regions).toEqual(["us-east-1"]);
    expect(result.items).toEqual([]);
    expect(result.skipped).toEqual([
      {
        reason: "out-of-scope",
        resourceType: "aws_instance",
        address: "aws_instance.api",
        liveId: "i-api",
        region: "us-west-2",
        detail: "region us-west-2 is not being scanned",
      },
    ]);
  });

  it("applies the environment and severity thresholds", () => {
    const result = scan(declaredState(), liveSnapshot({ s3_buckets: [bucketRecord({ Tags: [] })] }), {
      environment: "staging",
      severityThresholds: { HIGH: ["configuration", "tags"], MEDIUM: [] },
    });

    expect(result.items[0]).toMatchObject({ driftType: "tags", severity: "HIGH", environment: "staging" });
  });
});

/* ================================================================
   Degraded input
   ================================================================ */

describe("per-resource failures", () => {
  it("skips live records without an identifier and continues", () => {
    const result = scan(
      declaredState(),
      liveSnapshot({ ec2_instances: [instanceRecord({ InstanceType: "t3.large" }), { InstanceType: "t3.nano" }, "garbage"] }),
    );

    expect(result.items).toHaveLength(1);
    expect(result.skipped).toEqual([
      { reason: "resource-shape", resourceType: "aws_instance", region: "us-east-1", detail: "ec2_instances[1] has no InstanceId" },
      { reason: "resource-shape", resourceType: "aws_instance", region: "us-east-1", detail: "ec2_instances[2] is not an object" },
    ]);
  });

  it("skips declared resources without an identifier", () => {
    const state = declaredState([managed("aws_instance", "orphan", { instance_type: "t3.micro" })]);
    const result = scan(state, liveSnapshot());

    expect(result.items).toEqual([]);
    expect(result.skipped).toEqual([
      {
        reason: "resource-shape",
        resourceType: "aws_instance",
        address: "aws_instance.orphan",
        detail: "declared attributes carry no EC2 instance identifier",
      },
    ]);
  });

  it("skips declared types without a comparator", () => {
    const { engine, memory } = makeEngine();
    const state = declaredState([managed("aws_route53_zone", "main", { id: "Z123", name: "example.test" })]);

    const result = engine.scan(state, liveSnapshot(), { now: fixedClock });

    expect(result.items).toEqual([]);
    expect(result.skipped).toEqual([
      {
        reason: "unknown-resource-type",
        resourceType: "aws_route53_zone",
        address: "aws_route53_zone.main",
        detail: "no comparator registered for aws_route53_zone",
      },
    ]);
    expect(memory.messages("warn")).toContain("No comparator registered for aws_route53_zone; skipping 1 resource(s)");
  });

  it("records mistyped fields as shape issues", () => {
    const result = scan(declaredState(), liveSnapshot({ ec2_instances: [instanceRecord({ ImageId: 7 })] }));

    expect(result.shapeIssues).toEqual([
      { resourceType: "aws_instance", resourceId: "i-web", side: "live", field: "ImageId", detail: "expected string, got number" },
      {
        resourceType: "aws_instance",
        resourceId: "i-web",
        side: "live",
        field: "imageId",
        detail: "imageId is absent or unreadable; compared as null",
      },
    ]);
    expect(result.items[0]!.differences.imageId).toMatchObject({ declared: "ami-111", live: null });
  });

  it("turns comparator failures into skipped resources", () => {
    const registry = createDefaultRegistry();
    registry.register({
      ...computeInstanceKind,
      compare: () => {
        throw new Error("boom");
      },
    });
    const { engine } = makeEngine({}, registry);

    const result = engine.scan(declaredState(), liveSnapshot(), { now: fixedClock });

    expect(result.items).toEqual([]);
    expect(result.skipped).toEqual([
      {
        reason: "resource-shape",
        resourceType: "aws_instance",
        address: "aws_instance.web",
        liveId: "i-web",
        region: "us-east-1",
        detail: "comparison failed: boom",
      },
    ]);
  });
});

describe("document failures", () => {
  it("throws SnapshotShapeError for a malformed snapshot", () => {
    const { engine } = makeEngine();
    expect(() => engine.scan(declaredState(), { "us-east-1": { ec2_instances: 5 } })).toThrow(SnapshotShapeError);
    expect(() => engine.scan(declaredState(), ["us-east-1"])).toThrow(SnapshotShapeError);
  });

  it("throws ParseError for a malformed state document", () => {
    const { engine } = makeEngine();
    expect(() => engine.scan("{ not json", liveSnapshot())).toThrow(ParseError);
  });
});

/* ================================================================
   Logging and helpers
   ================================================================ */

describe("scan logging", () => {
  it("logs start and completion with the scan id", () => {
    const { engine, memory } = makeEngine();
    engine.scan(declaredState(), liveSnapshot(), { scanId: "scan-logged", now: fixedClock });

    expect(memory.messages("info")).toEqual(["Drift scan started", "Drift scan completed"]);
    expect(memory.entries.filter((e) => e.level === "info").every((e) => e.scanId === "scan-logged")).toBe(true);
    expect(memory.entries.filter((e) => e.message === "Analyzing region").map((e) => e.region)).toEqual(["us-east-1", "us-west-2"]);
  });
});

describe("detectDrift", () => {
  it("parses, scans and returns the result in one call", () => {
    const memory = new MemoryTransport();
    const result = detectDrift(JSON.stringify(declaredState()), liveSnapshot({ ec2_instances: [] }), {
      logger: createDriftLogger("test", { transports: [memory] }),
      scanId: "scan-shorthand",
      now: fixedClock,
    });

    expect(result.scanId).toBe("scan-shorthand");
    expect(result.items.map((item) => item.driftType)).toEqual(["missing"]);
  });
});

describe("declaredRegionHint", () => {
  const resource = (attributes: Record<string, unknown>) => ({ type: "t", name: "n", address: "t.n", attributes });

  it("reads region, ARN or availability zone", () => {
    expect(declaredRegionHint(resource({ region: "eu-west-1", availability_zone: "us-east-1a" }))).toBe("eu-west-1");
    expect(declaredRegionHint(resource({ arn: "arn:aws:lambda:ap-south-1:111122223333:function:fn" }))).toBe("ap-south-1");
    expect(declaredRegionHint(resource({ availability_zone: "us-gov-west-1b" }))).toBe("us-gov-west-1");
    expect(declaredRegionHint(resource({ arn: "arn:aws:iam::111122223333:role/x" }))).toBeUndefined();
    expect(declaredRegionHint(resource({}))).toBeUndefined();
  });
});
