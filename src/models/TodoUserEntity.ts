import { Column, Entity, PrimaryGeneratedColumn } from "typeorm";

/**
 * Member account.
 *
 * Emails are stored normalized (trimmed and lower-cased) so the unique index
 * covers addresses differing only by case.
 */
@Entity({ name: "users" })
export class TodoUserEntity {
  @PrimaryGeneratedColumn()
  public id!: number;

  @Column({ type: "varchar", unique: true })
  public email!: string;

  @Column({ type: "varchar" })
  public name!: string;

  /** `<salt>:<key>` produced by PasswordUtil. */
  @Column({ type: "varchar" })
  public password_hash!: string;
}
