import mongoose from "mongoose";
import {Category, Counter, Question} from "./types";

export const categorySchema = new mongoose.Schema<Category>({
    id: {type: Number, required: true, unique: true},
    type: {type: String, required: true},
});

export const questionSchema = new mongoose.Schema<Question>({
    id: {type: Number, required: true, unique: true},
    question: {type: String, required: true},
    answer: {type: String, required: true},
    difficulty: {type: Number, required: true},
    category: {type: Number, required: true, index: true},
});

export const counterSchema = new mongoose.Schema<Counter>({
    _id: String,
    seq: {type: Number, default: 0},
});
