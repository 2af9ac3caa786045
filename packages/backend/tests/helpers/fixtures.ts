import type { RawHit } from "@regintel/shared";

export const rssHits: RawHit[] = [
  {
    id: 101,
    distance: 0.91,
    text_content: "Acme Devices received clearance for its infusion pump after a second review cycle.",
    article_title: "Acme infusion pump cleared",
    published_date: "2025-07-01",
    feed_name: "Device News Daily",
    chunk_type: "body",
    companies: ["Acme Devices"],
    products: "[\"infusion pump\"]",
    regulations: "510(k)",
    regulatory_bodies: ["FDA"]
  },
  {
    id: 102,
    distance: 0.88,
    text_content: "Regulators published draft guidance on cybersecurity for connected devices.",
    article_title: "Draft cybersecurity guidance",
    published_date: "2025-07-02",
    feed_name: "Policy Wire",
    chunk_type: "summary",
    companies: [],
    products: [],
    regulations: [],
    regulatory_bodies: ["FDA", "CISA"]
  },
  {
    id: 103,
    distance: 0.85,
    text_content: "A recall notice was issued for a batch of test strips.",
    article_title: "Test strip recall",
    published_date: "2025-07-03",
    feed_name: "Recall Watch"
  },
  {
    id: 104,
    distance: 0.8,
    text_content: "Quarterly summary of enforcement actions."
  },
  {
    id: 105,
    distance: 0.75,
    text_content: "Advisory committee meeting scheduled for autumn.",
    article_title: "Advisory committee meeting"
  }
];

export const warningLetterHits: RawHit[] = [
  {
    id: 201,
    distance: 0.93,
    text_content: "The firm failed to establish adequate procedures for corrective and preventive action.",
    company_name: "Sample Vapor Co",
    letter_date: "2025-05-12",
    chunk_type: "violations",
    chunk_id: "letter-17-chunk-2",
    violations: ["21 CFR 820.100"],
    required_actions: ["Submit a CAPA plan within 15 business days"],
    systemic_issues: [],
    regulatory_consequences: ["Import alert"],
    product_types: ["tobacco"],
    product_categories: ["ENDS"]
  }
];
