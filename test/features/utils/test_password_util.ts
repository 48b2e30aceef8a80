import { PasswordUtil } from "../../../src/utils/PasswordUtil";

const PLAINTEXTS: string[] = [
  "",
  "correct horse battery staple",
  "pässwörd-ñ-密码-🔐",
  "'; DROP TABLE users; --",
  " leading and trailing ",
];

export async function test_password_util_round_trip(): Promise<void> {
  for (const plain of PLAINTEXTS) {
    const hashed: string = await PasswordUtil.hash(plain);
    expect(hashed).toHaveLength(161);
    expect(await PasswordUtil.verify(plain, hashed)).toBe(true);
  }
}

export async function test_password_util_mismatch(): Promise<void> {
  const hashed: string = await PasswordUtil.hash("secret");
  expect(await PasswordUtil.verify("Secret", hashed)).toBe(false);
  expect(await PasswordUtil.verify("secret ", hashed)).toBe(false);
  expect(await PasswordUtil.verify("", hashed)).toBe(false);
}

export async function test_password_util_salted(): Promise<void> {
  const first: string = await PasswordUtil.hash("same");
  const second: string = await PasswordUtil.hash("same");
  expect(first).not.toBe(second);
  expect(first.split(":")[0]).not.toBe(second.split(":")[0]);
}

export async function test_password_util_malformed_hash(): Promise<void> {
  const hashed: string = await PasswordUtil.hash("secret");
  const malformed: string[] = [
    "",
    "secret",
    "zz:zz",
    hashed.toUpperCase(),
    hashed.slice(0, -2),
    `${hashed}00`,
    hashed.replace(":", "$"),
  ];
  for (const value of malformed)
    expect(await PasswordUtil.verify("secret", value)).toBe(false);
}
