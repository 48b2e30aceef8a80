import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from "typeorm";

import { TodoUserEntity } from "./TodoUserEntity";

@Entity({ name: "todos" })
export class TodoEntity {
  @PrimaryGeneratedColumn()
  public id!: number;

  @Index()
  @Column({ type: "integer" })
  public user_id!: number;

  @ManyToOne(() => TodoUserEntity, { nullable: false, onDelete: "CASCADE" })
  @JoinColumn({ name: "user_id" })
  public user?: TodoUserEntity;

  @Column({ type: "varchar" })
  public title!: string;

  @Column({ type: "varchar" })
  public description!: string;
}
