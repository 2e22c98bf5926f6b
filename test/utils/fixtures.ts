/**
 * Sequencing file fixtures written to a temporary directory
 */

import { gzipSync } from "fflate";
import { encodeBam } from "./bam";
import { bytes } from "./streams";

export const CASAVA_READS = [
  "A00123:8:HFWT2DSXX:1:1101:10004:1000 1:N:0:ACGTACGT",
  "A00123:8:HFWT2DSXX:1:1101:10022:1000 1:N:0:ACGTACGT",
  "A00123:8:HFWT2DSXX:1:1101:10040:1016 1:N:0:ACGTACGT",
  "A00123:8:HFWT2DSXX:2:1102:10058:1016 1:N:0:ACGTACGT",
];

export const CCS_READS = ["m64011_190830_220126/101/ccs", "m64011_190830_220126/102/ccs"];

export const NANOPORE_READS = [
  "0a1b2c3d-4e5f-6789-abcd-ef0123456789 read=1 ch=7 flow_cell_id=FAH00001",
  "1a1b2c3d-4e5f-6789-abcd-ef0123456789 read=2 ch=9 flow_cell_id=FAH00001",
];

export function fastqText(names: readonly string[]): string {
  return names.map((name) => `@${name}\nACGTACGTAC\n+\nIIIIIIIIII\n`).join("");
}

export function gzippedFastq(names: readonly string[]): Uint8Array {
  return gzipSync(bytes(fastqText(names)));
}

export const BAM_HEADER = [
  "@HD\tVN:1.6\tSO:unsorted",
  "@RG\tID:m64011\tSM:NA24149\tPL:PACBIO\tCN:NIST",
  "@PG\tID:pbmm2\tPN:pbmm2",
  "",
].join("\n");

export function gzippedBam(): Uint8Array {
  return gzipSync(encodeBam(BAM_HEADER, [{ name: "chr1", length: 249250621 }], CCS_READS));
}

export const VCF_TEXT = [
  "##fileformat=VCFv4.2",
  "##source=DeepVariant",
  "##reference=GRCh38",
  "#CHROM\tPOS\tID\tREF\tALT\tQUAL\tFILTER\tINFO\tFORMAT\tHG002",
  "chr1\t100\t.\tA\tG\t50\tPASS\t.\tGT\t0/1",
  "",
].join("\n");
