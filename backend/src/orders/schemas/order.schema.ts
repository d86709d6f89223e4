// Order Schema - đơn đặt vé của user
// 1 order gồm nhiều ticket; mỗi ticket = 1 ghế (row, seat) trong 1 suất chiếu

import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type OrderDocument = HydratedDocument<Order>;

// Ticket là subdocument nằm trong order (không có collection riêng)
@Schema({ _id: false })
export class Ticket {
  @Prop({ type: Types.ObjectId, ref: 'MovieSession', required: true })
  movieSession!: Types.ObjectId;

  // Hàng ghế, đánh số từ 1
  @Prop({ required: true, min: 1 })
  row!: number;

  // Số ghế trong hàng, đánh số từ 1
  @Prop({ required: true, min: 1 })
  seat!: number;
}

export const TicketSchema = SchemaFactory.createForClass(Ticket);

@Schema({
  timestamps: { createdAt: true, updatedAt: false },
  collection: 'orders',
})
export class Order {
  @Prop({ type: Types.ObjectId, ref: 'User', required: true, index: true })
  user!: Types.ObjectId;

  @Prop({ type: [TicketSchema], required: true })
  tickets!: Ticket[];

  createdAt!: Date;
}

export const OrderSchema = SchemaFactory.createForClass(Order);

// Đếm ghế đã bán / ghế đã có người theo suất chiếu
OrderSchema.index({ 'tickets.movieSession': 1 });
// Danh sách đơn của user, mới nhất trước
OrderSchema.index({ user: 1, createdAt: -1 });
