import mongoose from "mongoose";
import {Category, Counter, Question} from "./types";
import {categorySchema, counterSchema, questionSchema} from "./schemas";

export const CategoryModel = mongoose.model<Category>('Category', categorySchema);
export const QuestionModel = mongoose.model<Question>('Question', questionSchema);
export const CounterModel = mongoose.model<Counter>('Counter', counterSchema);
