import { describe, it, expect } from "vitest";
import {
  parseCertificateRef,
  parseSecretsLocation,
  parseStorageBucketRef,
  resolveReferences,
} from "./reference-resolver";
import { DescriptorReferenceError } from "../types/errors";
import {
  ACM_CERTIFICATE_ARN,
  IAM_CERTIFICATE_ARN,
  createDescriptor,
} from "../../tests/fixtures/test-data";

describe("parseSecretsLocation", () => {
  it("should split scheme, bucket and key", () => {
    expect(parseSecretsLocation("s3://bucket-name/key.json")).toEqual({
      success: true,
      data: { uri: "s3://bucket-name/key.json", scheme: "s3", bucket: "bucket-name", key: "key.json" },
    });
  });

  it("should keep slashes in the key", () => {
    const result = parseSecretsLocation("s3://billing-app-secrets/production/2024/secrets.json");

    expect(result.success && result.data.key).toBe("production/2024/secrets.json");
  });

  it("should reject a string without a scheme", () => {
    expect(parseSecretsLocation("not-a-uri")).toEqual({
      success: false,
      reason: '"not-a-uri" is not of the form <scheme>://<bucket>/<key>',
    });
  });

  it("should reject a location without a key", () => {
    expect(parseSecretsLocation("s3://billing-app-secrets/").success).toBe(false);
  });

  it("should reject an invalid bucket name", () => {
    expect(parseSecretsLocation("s3://Billing_Secrets/secrets.json")).toEqual({
      success: false,
      reason: '"Billing_Secrets" is not a valid bucket name',
    });
  });
});

describe("parseCertificateRef", () => {
  it("should parse a regional certificate ARN", () => {
    expect(parseCertificateRef(ACM_CERTIFICATE_ARN)).toEqual({
      success: true,
      data: {
        arn: ACM_CERTIFICATE_ARN,
        partition: "aws",
        service: "acm",
        region: "us-east-1",
        accountId: "123456789012",
        resourceType: "certificate",
        resourceId: "0f1e2d3c-aaaa-bbbb-cccc-123456789abc",
      },
    });
  });

  it("should parse a global server certificate ARN", () => {
    const result = parseCertificateRef(IAM_CERTIFICATE_ARN);

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.service).toBe("iam");
      expect(result.data.region).toBe("");
      expect(result.data.resourceId).toBe("legacy-billing-cert");
    }
  });

  it("should reject a regional certificate ARN without a region", () => {
    const result = parseCertificateRef("arn:aws:acm::123456789012:certificate/abc-123");

    expect(result).toEqual({
      success: false,
      reason:
        '"arn:aws:acm::123456789012:certificate/abc-123" does not name an acm certificate or an iam server-certificate',
    });
  });

  it("should reject ARNs of other resources", () => {
    expect(parseCertificateRef("arn:aws:s3:::billing-app-artifacts").success).toBe(false);
  });
});

describe("parseStorageBucketRef", () => {
  it.each([
    ["billing-app-artifacts", true],
    ["billing.app.artifacts", true],
    ["ab", false],
    ["Billing-Artifacts", false],
    ["billing..artifacts", false],
    ["192.168.10.4", false],
  ])("should judge %s as valid: %s", (name, valid) => {
    expect(parseStorageBucketRef(name).success).toBe(valid);
  });
});

describe("resolveReferences", () => {
  it("should attach typed handles", () => {
    const result = resolveReferences(createDescriptor());

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.references).toEqual({
        storageBucket: { bucketName: "billing-app-artifacts" },
        secretsLocation: {
          uri: "s3://billing-app-secrets/dev/secrets.json",
          scheme: "s3",
          bucket: "billing-app-secrets",
          key: "dev/secrets.json",
        },
      });
      expect(result.data.region).toBe("us-east-1");
    }
  });

  it("should include the certificate handle when a certificate is set", () => {
    const result = resolveReferences(
      createDescriptor({ domain: "billing.example.com", certificateRef: ACM_CERTIFICATE_ARN }),
    );

    expect(result.success && result.data.references.certificate?.accountId).toBe("123456789012");
  });

  it("should report the first malformed reference", () => {
    const result = resolveReferences(
      createDescriptor({ storageBucketRef: "Artifacts_Bucket", secretsLocationRef: "not-a-uri" }),
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(DescriptorReferenceError);
      expect(result.error.reason).toBe("malformed-reference");
      expect(result.error.fieldPath).toBe("storageBucketRef");
      expect(result.error.reference).toBe("Artifacts_Bucket");
      expect(result.error.message).toBe(
        '[dev] storageBucketRef: "Artifacts_Bucket" is not a valid bucket name',
      );
    }
  });

  it("should report a malformed secrets location", () => {
    const result = resolveReferences(createDescriptor({ secretsLocationRef: "not-a-uri" }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.fieldPath).toBe("secretsLocationRef");
      expect(result.error.code).toBe("MALFORMED_REFERENCE");
    }
  });

  it("should report a malformed certificate", () => {
    const result = resolveReferences(createDescriptor({ certificateRef: "arn:aws:acm:us-east-1:1234:certificate/x" }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.fieldPath).toBe("certificateRef");
    }
  });

  it("should not modify its input", () => {
    const descriptor = createDescriptor();

    resolveReferences(descriptor);

    expect("references" in descriptor).toBe(false);
  });
});
